import type { PayrailAdapter } from "@payrail/core";
import { describe, expect, it, vi } from "vitest";
import { createRepository, toAccount, toPayment } from "../db/repository.js";

const ACCOUNT_ID = "0b6d2a8e-5c1f-4e7a-9b3d-2f8c6a1e4d70";
const BENEFICIARY_ID = "7e3c9f1a-2b4d-4c8e-a6f0-5d1b8e2c9a43";
const PAYMENT_ID = "c4a81e6f-9d2b-4f3a-8e7c-1b5d0a9f6e28";

function createMockAdapter(): PayrailAdapter {
	return {
		id: "mock",
		create: vi.fn().mockResolvedValue(1),
		findOne: vi.fn().mockResolvedValue(null),
		findMany: vi.fn().mockResolvedValue([]),
		update: vi.fn().mockResolvedValue(1),
		delete: vi.fn().mockResolvedValue(1),
		count: vi.fn().mockResolvedValue(0),
		transaction: vi.fn(),
		raw: vi.fn(),
		options: { dialectName: "postgres", supportsForUpdate: true },
	};
}

// =============================================================================
// ROW MAPPING
// =============================================================================

describe("row mapping", () => {
	it("reads BIGINT strings and timestamp strings from SQL rows", () => {
		expect(
			toAccount({
				accountId: ACCOUNT_ID,
				accountType: "SAVINGS",
				balance: "9007199254740991",
				currency: "USD",
				createdAt: "2026-01-01T09:00:00.000Z",
			}),
		).toEqual({
			accountId: ACCOUNT_ID,
			accountType: "SAVINGS",
			balance: 9007199254740991,
			currency: "USD",
			createdAt: new Date("2026-01-01T09:00:00.000Z"),
		});
	});

	it("maps missing optional timestamps to null", () => {
		const payment = toPayment({
			paymentId: PAYMENT_ID,
			amount: 500,
			currency: "EUR",
			beneficiaryId: BENEFICIARY_ID,
			sourceAccountId: ACCOUNT_ID,
			status: "COMPLETED",
			type: "ACH",
			scheduledDate: null,
			createdAt: new Date("2026-01-01T09:00:00.000Z"),
			completedAt: new Date("2026-01-01T09:00:00.000Z"),
		});

		expect(payment.scheduledDate).toBeNull();
		expect(payment.completedAt).toEqual(new Date("2026-01-01T09:00:00.000Z"));
	});

	it.each([
		[{ balance: "12.5" }, "Malformed balance in store row: 12.5"],
		[{ balance: "9007199254740993" }, "Malformed balance in store row: 9007199254740993"],
		[{ accountType: "GOLD" }, "Malformed accountType in store row: GOLD"],
		[{ createdAt: "yesterday" }, "Malformed createdAt in store row: yesterday"],
		[{ currency: null }, "Malformed currency in store row: null"],
	])("rejects the malformed row %o", (override, message) => {
		const row = {
			accountId: ACCOUNT_ID,
			accountType: "CHECKING",
			balance: 1,
			currency: "USD",
			createdAt: "2026-01-01T09:00:00.000Z",
			...override,
		};

		expect(() => toAccount(row)).toThrow(expect.objectContaining({ code: "INTERNAL", message }));
	});
});

// =============================================================================
// QUERIES
// =============================================================================

describe("createRepository", () => {
	it("debits conditionally on the balance covering the amount", async () => {
		const adapter = createMockAdapter();

		expect(await createRepository(adapter).debitAccount(ACCOUNT_ID, 4000)).toBe(1);
		expect(adapter.update).toHaveBeenCalledWith({
			model: "accounts",
			where: [
				{ field: "accountId", operator: "eq", value: ACCOUNT_ID },
				{ field: "balance", operator: "gte", value: 4000 },
			],
			increment: { balance: -4000 },
		});
	});

	it("moves a payment status only from the expected status", async () => {
		const adapter = createMockAdapter();
		const completedAt = new Date("2026-01-01T09:00:00.000Z");

		await createRepository(adapter).updatePaymentStatus(PAYMENT_ID, "SCHEDULED", {
			status: "COMPLETED",
			completedAt,
		});

		expect(adapter.update).toHaveBeenCalledWith({
			model: "payments",
			where: [
				{ field: "paymentId", operator: "eq", value: PAYMENT_ID },
				{ field: "status", operator: "eq", value: "SCHEDULED" },
			],
			update: { status: "COMPLETED", completedAt },
		});
	});

	it("passes the lock request through to the adapter", async () => {
		const adapter = createMockAdapter();

		expect(await createRepository(adapter).getAccount(ACCOUNT_ID, { forUpdate: true })).toBeNull();
		expect(adapter.findOne).toHaveBeenCalledWith({
			model: "accounts",
			where: [{ field: "accountId", operator: "eq", value: ACCOUNT_ID }],
			forUpdate: true,
		});
	});

	it("answers ids that are not UUIDs without querying the store", async () => {
		const adapter = createMockAdapter();
		const repo = createRepository(adapter);

		expect(await repo.getAccount("acc1", { forUpdate: true })).toBeNull();
		expect(await repo.getBeneficiary("ben1")).toBeNull();
		expect(await repo.getPayment("pay1")).toBeNull();
		expect(await repo.deleteBeneficiary("ben1")).toBe(0);
		expect(await repo.countPaymentsForBeneficiary("ben1")).toBe(0);
		expect(await repo.listPayments({ sourceAccountId: "acc1" })).toEqual([]);

		expect(adapter.findOne).not.toHaveBeenCalled();
		expect(adapter.findMany).not.toHaveBeenCalled();
		expect(adapter.delete).not.toHaveBeenCalled();
		expect(adapter.count).not.toHaveBeenCalled();
	});

	it("escapes LIKE wildcards in the beneficiary name filter", async () => {
		const adapter = createMockAdapter();

		await createRepository(adapter).listBeneficiaries({ name: "50%_off" });

		expect(adapter.findMany).toHaveBeenCalledWith({
			model: "beneficiaries",
			where: [{ field: "name", operator: "ilike", value: "%50\\%\\_off%" }],
			sortBy: [
				{ field: "createdAt", direction: "asc" },
				{ field: "beneficiaryId", direction: "asc" },
			],
		});
	});

	it("adds tie-breakers after the requested payment sort", async () => {
		const adapter = createMockAdapter();
		const repo = createRepository(adapter);

		await repo.listPayments({ currency: "USD", minAmount: 100 }, { field: "amount", direction: "desc" }, 10);
		await repo.listPayments({}, { field: "createdAt", direction: "desc" });

		expect(adapter.findMany).toHaveBeenNthCalledWith(1, {
			model: "payments",
			where: [
				{ field: "amount", operator: "gte", value: 100 },
				{ field: "currency", operator: "eq", value: "USD" },
			],
			sortBy: [
				{ field: "amount", direction: "desc" },
				{ field: "createdAt", direction: "asc" },
				{ field: "paymentId", direction: "asc" },
			],
			limit: 10,
		});
		expect(adapter.findMany).toHaveBeenNthCalledWith(2, {
			model: "payments",
			where: [],
			sortBy: [
				{ field: "createdAt", direction: "desc" },
				{ field: "paymentId", direction: "asc" },
			],
			limit: undefined,
		});
	});

	it("filters accounts by balance range", async () => {
		const adapter = createMockAdapter();

		await createRepository(adapter).listAccounts({ minBalance: 0, maxBalance: 500 });

		expect(adapter.findMany).toHaveBeenCalledWith(
			expect.objectContaining({
				model: "accounts",
				where: [
					{ field: "balance", operator: "gte", value: 0 },
					{ field: "balance", operator: "lte", value: 500 },
				],
			}),
		);
	});
});
