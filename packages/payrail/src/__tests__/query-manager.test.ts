import type { Payment, PayrailLogger } from "@payrail/core";
import { assertPaymentCount, getTestInstance, seedAccount, seedBeneficiary } from "@payrail/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AddAccountParams } from "../managers/account-manager.js";

function at(iso: string): void {
	vi.setSystemTime(new Date(iso));
}

beforeEach(() => {
	vi.useFakeTimers({ toFake: ["Date"] });
	at("2026-01-01T09:00:00.000Z");
});

afterEach(() => {
	vi.useRealTimers();
});

// =============================================================================
// ACCOUNTS
// =============================================================================

describe("accounts", () => {
	it("adds an account in the default currency and logs it", async () => {
		const logger: PayrailLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
		const { payrail } = getTestInstance({ logger, currency: "EUR" });

		const account = await payrail.accounts.add({ accountType: "SAVINGS", balance: 2500 });

		expect(account).toMatchObject({ accountType: "SAVINGS", balance: 2500, currency: "EUR" });
		expect(account.createdAt).toEqual(new Date("2026-01-01T09:00:00.000Z"));
		expect(await payrail.accounts.get(account.accountId)).toEqual(account);
		expect(logger.info).toHaveBeenCalledWith("Account added", {
			accountId: account.accountId,
			accountType: "SAVINGS",
			currency: "EUR",
		});
	});

	const invalidAccounts: Array<[AddAccountParams, string]> = [
		[
			{ accountType: "CHECKING", balance: -1 },
			"balance must be a non-negative integer in minor units, got -1",
		],
		[
			{ accountType: "CHECKING", balance: 10.5 },
			"balance must be a non-negative integer in minor units, got 10.5",
		],
		[
			{ accountType: "CHECKING", balance: 100, currency: "US" },
			'currency must be a 3-letter upper-case ISO 4217 code, got "US"',
		],
	];

	it.each(invalidAccounts)("rejects %o", async (params, message) => {
		const { payrail, adapter } = getTestInstance();

		await expect(payrail.accounts.add(params)).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
			message,
		});
		expect(await adapter.count({ model: "accounts" })).toBe(0);
	});

	it("returns the balance of an account", async () => {
		const { payrail } = getTestInstance();
		const account = await seedAccount(payrail, 4200);

		expect(await payrail.accounts.getBalance(account.accountId)).toEqual({
			accountId: account.accountId,
			balance: 4200,
			currency: "USD",
		});
	});

	it("raises ACCOUNT_NOT_FOUND for an unknown account", async () => {
		const { payrail } = getTestInstance();

		await expect(payrail.accounts.getBalance("missing-account")).rejects.toMatchObject({
			code: "ACCOUNT_NOT_FOUND",
			message: "Account not found: missing-account",
		});
	});

	it("adds several accounts together", async () => {
		const { payrail, adapter } = getTestInstance();

		const accounts = await payrail.accounts.addMany([
			{ accountType: "CHECKING", balance: 100 },
			{ accountType: "LOAN", balance: 0, currency: "GBP" },
		]);

		expect(accounts.map((a) => a.currency)).toEqual(["USD", "GBP"]);
		expect(await adapter.count({ model: "accounts" })).toBe(2);
	});

	it("adds none of the accounts when one is invalid", async () => {
		const { payrail, adapter } = getTestInstance();

		await expect(
			payrail.accounts.addMany([
				{ accountType: "CHECKING", balance: 100 },
				{ accountType: "CHECKING", balance: -1 },
			]),
		).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
			message: "accounts[1]: balance must be a non-negative integer in minor units, got -1",
			details: { balance: -1, index: 1 },
		});
		expect(await adapter.count({ model: "accounts" })).toBe(0);
	});

	it("rejects an empty account list", async () => {
		const { payrail } = getTestInstance();

		await expect(payrail.accounts.addMany([])).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
			message: "accounts must not be empty",
		});
	});

	describe("list", () => {
		async function seedThree() {
			const instance = getTestInstance();
			const { payrail } = instance;
			at("2026-01-01T09:00:00.000Z");
			const checking = await payrail.accounts.add({ accountType: "CHECKING", balance: 5000 });
			at("2026-01-01T10:00:00.000Z");
			const savings = await payrail.accounts.add({ accountType: "SAVINGS", balance: 20000 });
			at("2026-01-01T11:00:00.000Z");
			const euro = await payrail.accounts.add({
				accountType: "CHECKING",
				balance: 100,
				currency: "EUR",
			});
			return { payrail, checking, savings, euro };
		}

		it("orders by balance, highest first, by default", async () => {
			const { payrail, checking, savings, euro } = await seedThree();

			const ids = (await payrail.accounts.list()).map((a) => a.accountId);

			expect(ids).toEqual([savings.accountId, checking.accountId, euro.accountId]);
		});

		it("combines filters", async () => {
			const { payrail, checking } = await seedThree();

			const found = await payrail.accounts.list({
				accountType: "CHECKING",
				currency: "USD",
				minBalance: 1000,
				maxBalance: 5000,
			});

			expect(found.map((a) => a.accountId)).toEqual([checking.accountId]);
		});

		it("sorts by creation time when asked", async () => {
			const { payrail, checking, savings, euro } = await seedThree();

			const ids = (await payrail.accounts.list({ sortBy: "createdAt", sortOrder: "asc" })).map(
				(a) => a.accountId,
			);

			expect(ids).toEqual([checking.accountId, savings.accountId, euro.accountId]);
		});

		it("summarizes balances per currency and accounts per type", async () => {
			const { payrail } = await seedThree();
			at("2026-01-02T00:00:00.000Z");

			expect(await payrail.accounts.summary()).toEqual({
				totalAccounts: 3,
				balanceByCurrency: { USD: 25000, EUR: 100 },
				accountsByType: { CHECKING: 2, SAVINGS: 1 },
				lastUpdated: new Date("2026-01-02T00:00:00.000Z"),
			});
		});
	});
});

// =============================================================================
// BENEFICIARIES
// =============================================================================

describe("beneficiaries", () => {
	it("trims and stores a beneficiary", async () => {
		const { payrail } = getTestInstance();

		const beneficiary = await payrail.beneficiaries.add({
			name: "  Acme Supplies ",
			accountNumber: " 12345678 ",
			bankCode: "ACMEGB2L",
		});

		expect(beneficiary).toMatchObject({
			name: "Acme Supplies",
			accountNumber: "12345678",
			bankCode: "ACMEGB2L",
		});
		expect(await payrail.beneficiaries.get(beneficiary.beneficiaryId)).toEqual(beneficiary);
	});

	it("rejects blank fields", async () => {
		const { payrail } = getTestInstance();

		await expect(
			payrail.beneficiaries.add({ name: "   ", accountNumber: "1", bankCode: "X" }),
		).rejects.toMatchObject({ code: "INVALID_ARGUMENT", message: "name must not be empty" });
		await expect(
			payrail.beneficiaries.add({ name: "A", accountNumber: "1", bankCode: "" }),
		).rejects.toMatchObject({ code: "INVALID_ARGUMENT", message: "bankCode must not be empty" });
	});

	it("searches names case-insensitively and bank codes exactly", async () => {
		const { payrail } = getTestInstance();
		at("2026-01-01T09:00:00.000Z");
		const acmeCorp = await payrail.beneficiaries.add({
			name: "ACME Corp",
			accountNumber: "1",
			bankCode: "BANKA",
		});
		at("2026-01-01T10:00:00.000Z");
		const acmeLtd = await payrail.beneficiaries.add({
			name: "Acme Ltd",
			accountNumber: "2",
			bankCode: "BANKB",
		});
		at("2026-01-01T11:00:00.000Z");
		await payrail.beneficiaries.add({ name: "Zenith", accountNumber: "3", bankCode: "BANKA" });

		const byName = await payrail.beneficiaries.search({ name: "acme" });
		expect(byName.map((b) => b.beneficiaryId)).toEqual([
			acmeCorp.beneficiaryId,
			acmeLtd.beneficiaryId,
		]);

		const both = await payrail.beneficiaries.search({ name: "acme", bankCode: "BANKA" });
		expect(both.map((b) => b.beneficiaryId)).toEqual([acmeCorp.beneficiaryId]);

		expect(await payrail.beneficiaries.search({ bankCode: "banka" })).toEqual([]);
		expect(await payrail.beneficiaries.search()).toHaveLength(3);
	});

	it("treats LIKE wildcards in the name as literal text", async () => {
		const { payrail } = getTestInstance();
		const percent = await payrail.beneficiaries.add({
			name: "100% Organic",
			accountNumber: "1",
			bankCode: "B",
		});
		await payrail.beneficiaries.add({ name: "1000 Organic", accountNumber: "2", bankCode: "B" });

		const found = await payrail.beneficiaries.search({ name: "0% o" });

		expect(found.map((b) => b.beneficiaryId)).toEqual([percent.beneficiaryId]);
	});

	it("deletes an unreferenced beneficiary", async () => {
		const { payrail } = getTestInstance();
		const beneficiary = await seedBeneficiary(payrail);

		await payrail.beneficiaries.delete(beneficiary.beneficiaryId);

		await expect(payrail.beneficiaries.get(beneficiary.beneficiaryId)).rejects.toMatchObject({
			code: "BENEFICIARY_NOT_FOUND",
		});
	});

	it("raises BENEFICIARY_NOT_FOUND when deleting an unknown beneficiary", async () => {
		const { payrail } = getTestInstance();

		await expect(payrail.beneficiaries.delete("missing")).rejects.toMatchObject({
			code: "BENEFICIARY_NOT_FOUND",
			details: { beneficiaryId: "missing" },
		});
	});

	it("refuses to delete a beneficiary that payments reference", async () => {
		const { payrail, adapter } = getTestInstance();
		const account = await seedAccount(payrail, 1000);
		const beneficiary = await seedBeneficiary(payrail);
		await payrail.payments.initiate({
			amount: 100,
			currency: "USD",
			beneficiaryId: beneficiary.beneficiaryId,
			sourceAccountId: account.accountId,
		});

		await expect(payrail.beneficiaries.delete(beneficiary.beneficiaryId)).rejects.toMatchObject({
			code: "CONFLICT",
			details: { beneficiaryId: beneficiary.beneficiaryId, payments: 1 },
		});
		expect(await payrail.beneficiaries.get(beneficiary.beneficiaryId)).toEqual(beneficiary);
		await assertPaymentCount(adapter, 1);
	});
});

// =============================================================================
// PAYMENT HISTORY & STATISTICS
// =============================================================================

describe("payment history", () => {
	async function seedHistory() {
		const { payrail } = getTestInstance();
		const usd = await seedAccount(payrail, 100000);
		const eur = await seedAccount(payrail, 100000, "EUR");
		const payee = await seedBeneficiary(payrail);
		const pay = (amount: number, sourceAccountId: string, currency = "USD") =>
			payrail.payments.initiate({
				amount,
				currency,
				beneficiaryId: payee.beneficiaryId,
				sourceAccountId,
			});

		at("2026-01-01T10:00:00.000Z");
		const a = await pay(1000, usd.accountId);
		at("2026-01-01T11:00:00.000Z");
		const b = await payrail.payments.initiate({
			amount: 5000,
			currency: "USD",
			beneficiaryId: payee.beneficiaryId,
			sourceAccountId: usd.accountId,
			paymentType: "WIRE_TRANSFER",
		});
		at("2026-01-01T12:00:00.000Z");
		const c = await pay(2000, eur.accountId, "EUR");
		at("2026-01-01T12:30:00.000Z");
		const d = await payrail.payments.schedule({
			amount: 3000,
			currency: "USD",
			beneficiaryId: payee.beneficiaryId,
			sourceAccountId: usd.accountId,
			scheduledDate: new Date("2026-01-05T00:00:00.000Z"),
		});

		return { payrail, usd, eur, a, b, c, d };
	}

	const ids = (payments: Payment[]) => payments.map((p) => p.paymentId);

	it("lists newest first by default", async () => {
		const { payrail, a, b, c, d } = await seedHistory();

		expect(ids(await payrail.payments.search())).toEqual(ids([d, c, b, a]));
	});

	it("filters by status, type and source account", async () => {
		const { payrail, eur, a, b, c } = await seedHistory();

		expect(ids(await payrail.payments.search({ status: "COMPLETED" }))).toEqual(ids([c, b, a]));
		expect(ids(await payrail.payments.search({ paymentType: "WIRE_TRANSFER" }))).toEqual(ids([b]));
		expect(ids(await payrail.payments.search({ sourceAccountId: eur.accountId }))).toEqual(
			ids([c]),
		);
	});

	it("combines currency and amount filters", async () => {
		const { payrail, b, d } = await seedHistory();

		const found = await payrail.payments.search({ currency: "USD", minAmount: 2000 });

		expect(ids(found)).toEqual(ids([d, b]));
	});

	it("treats date bounds as inclusive", async () => {
		const { payrail, b, c } = await seedHistory();

		const found = await payrail.payments.search({
			startDate: new Date("2026-01-01T11:00:00.000Z"),
			endDate: new Date("2026-01-01T12:00:00.000Z"),
		});

		expect(ids(found)).toEqual(ids([c, b]));
	});

	it("sorts by amount and by scheduled date with unscheduled payments last", async () => {
		const { payrail, a, b, c, d } = await seedHistory();

		expect(
			ids(await payrail.payments.search({}, { sortBy: "amount", sortOrder: "asc" })),
		).toEqual(ids([a, c, d, b]));
		expect(
			ids(await payrail.payments.search({}, { sortBy: "scheduledDate", sortOrder: "asc" })),
		).toEqual(ids([d, a, b, c]));
	});

	it("applies the limit after sorting", async () => {
		const { payrail, c, d } = await seedHistory();

		expect(ids(await payrail.payments.search({}, { limit: 2 }))).toEqual(ids([d, c]));
	});

	it("rejects a non-positive limit and an inverted period", async () => {
		const { payrail } = getTestInstance();

		await expect(payrail.payments.search({}, { limit: 0 })).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
			message: "limit must be a positive integer, got 0",
		});
		await expect(
			payrail.payments.search({
				startDate: new Date("2026-02-01T00:00:00.000Z"),
				endDate: new Date("2026-01-01T00:00:00.000Z"),
			}),
		).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
			message: "startDate must not be after endDate",
		});
	});

	it("aggregates statistics over every payment", async () => {
		const { payrail } = await seedHistory();
		at("2026-01-02T00:00:00.000Z");

		expect(await payrail.payments.statistics()).toEqual({
			totalPayments: 4,
			totalAmount: 11000,
			statusBreakdown: { COMPLETED: 3, SCHEDULED: 1 },
			currencyBreakdown: { USD: 9000, EUR: 2000 },
			typeBreakdown: { IMMEDIATE: 2, WIRE_TRANSFER: 1, SCHEDULED: 1 },
			period: { start: null, end: null },
			lastUpdated: new Date("2026-01-02T00:00:00.000Z"),
		});
	});

	it("restricts statistics to the period", async () => {
		const { payrail } = await seedHistory();
		const start = new Date("2026-01-01T11:00:00.000Z");
		const end = new Date("2026-01-01T12:00:00.000Z");

		const stats = await payrail.payments.statistics({ startDate: start, endDate: end });

		expect(stats).toMatchObject({
			totalPayments: 2,
			totalAmount: 7000,
			currencyBreakdown: { USD: 5000, EUR: 2000 },
			period: { start, end },
		});
	});
});
