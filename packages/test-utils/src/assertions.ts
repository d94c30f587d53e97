import type { PayrailAdapter } from "@payrail/core";
import type { Payrail } from "payrail";

/**
 * Assert that a specific account has the expected balance, in minor units.
 */
export async function assertAccountBalance(
	payrail: Payrail,
	accountId: string,
	expectedBalance: number,
): Promise<void> {
	const balance = await payrail.accounts.getBalance(accountId);
	if (balance.balance !== expectedBalance) {
		throw new Error(
			`Account ${accountId}: expected balance ${expectedBalance}, got ${balance.balance}`,
		);
	}
}

/**
 * Assert the number of stored payment rows, optionally for one source account.
 */
export async function assertPaymentCount(
	adapter: PayrailAdapter,
	expected: number,
	sourceAccountId?: string,
): Promise<void> {
	const count = await adapter.count({
		model: "payments",
		where: sourceAccountId
			? [{ field: "sourceAccountId", operator: "eq", value: sourceAccountId }]
			: [],
	});
	if (count !== expected) {
		throw new Error(`Expected ${expected} payment(s), found ${count}`);
	}
}

/**
 * Assert that an account's balance equals its opening balance minus every
 * COMPLETED payment debited from it.
 */
export async function assertBalanceConserved(
	payrail: Payrail,
	accountId: string,
	openingBalance: number,
): Promise<void> {
	const completed = await payrail.payments.search({
		sourceAccountId: accountId,
		status: "COMPLETED",
	});
	const debited = completed.reduce((sum, payment) => sum + payment.amount, 0);
	const { balance } = await payrail.accounts.getBalance(accountId);
	if (balance !== openingBalance - debited) {
		throw new Error(
			`Account ${accountId}: opening ${openingBalance} - debits ${debited} = ${openingBalance - debited}, got ${balance}`,
		);
	}
	if (balance < 0) {
		throw new Error(`Account ${accountId}: balance is negative (${balance})`);
	}
}
