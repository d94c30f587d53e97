import { describe, expect, it } from "vitest";
import { assertAccountBalance, assertBalanceConserved, assertPaymentCount } from "../assertions.js";
import { getTestInstance, seedAccount, seedBeneficiary } from "../get-test-instance.js";

describe("test instance", () => {
	it("starts with an empty store in USD", async () => {
		const { payrail, adapter } = getTestInstance();

		expect(payrail.$context.options.currency).toBe("USD");
		expect(await adapter.count({ model: "accounts" })).toBe(0);
		await assertPaymentCount(adapter, 0);
	});

	it("gives each instance its own store", async () => {
		const first = getTestInstance();
		const second = getTestInstance();
		await seedAccount(first.payrail, 100);

		expect(await second.adapter.count({ model: "accounts" })).toBe(0);
	});
});

describe("assertions", () => {
	it("names the account and both balances on mismatch", async () => {
		const { payrail } = getTestInstance();
		const account = await seedAccount(payrail, 500);

		await expect(assertAccountBalance(payrail, account.accountId, 500)).resolves.toBeUndefined();
		await expect(assertAccountBalance(payrail, account.accountId, 400)).rejects.toThrow(
			`Account ${account.accountId}: expected balance 400, got 500`,
		);
	});

	it("counts payments per source account", async () => {
		const { payrail, adapter } = getTestInstance();
		const account = await seedAccount(payrail, 500);
		const other = await seedAccount(payrail, 500);
		const beneficiary = await seedBeneficiary(payrail);
		await payrail.payments.initiate({
			amount: 100,
			currency: "USD",
			beneficiaryId: beneficiary.beneficiaryId,
			sourceAccountId: account.accountId,
		});

		await assertPaymentCount(adapter, 1);
		await assertPaymentCount(adapter, 1, account.accountId);
		await expect(assertPaymentCount(adapter, 1, other.accountId)).rejects.toThrow(
			"Expected 1 payment(s), found 0",
		);
	});

	it("checks conservation against completed debits", async () => {
		const { payrail } = getTestInstance();
		const account = await seedAccount(payrail, 500);
		const beneficiary = await seedBeneficiary(payrail);
		await payrail.payments.initiate({
			amount: 200,
			currency: "USD",
			beneficiaryId: beneficiary.beneficiaryId,
			sourceAccountId: account.accountId,
		});

		await expect(assertBalanceConserved(payrail, account.accountId, 500)).resolves.toBeUndefined();
		await expect(assertBalanceConserved(payrail, account.accountId, 600)).rejects.toThrow(
			`Account ${account.accountId}: opening 600 - debits 200 = 400, got 300`,
		);
	});
});
