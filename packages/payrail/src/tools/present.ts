// =============================================================================
// RESPONSE SHAPES — snake_case keys, decimal amounts, ISO 8601 timestamps
// =============================================================================

import type {
	Account,
	AccountBalance,
	AccountSummary,
	Beneficiary,
	Payment,
	PaymentStatistics,
} from "@payrail/core";
import { minorToDecimal } from "@payrail/core";

function iso(date: Date | null): string | null {
	return date ? date.toISOString() : null;
}

function decimalsByCurrency(amounts: Record<string, number>): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [currency, amount] of Object.entries(amounts)) {
		result[currency] = minorToDecimal(amount, currency);
	}
	return result;
}

export function presentAccount(account: Account) {
	return {
		account_id: account.accountId,
		account_type: account.accountType,
		balance: minorToDecimal(account.balance, account.currency),
		currency: account.currency,
		created_at: account.createdAt.toISOString(),
	};
}

export function presentBalance(balance: AccountBalance) {
	return {
		account_id: balance.accountId,
		balance: minorToDecimal(balance.balance, balance.currency),
		currency: balance.currency,
	};
}

export function presentBeneficiary(beneficiary: Beneficiary) {
	return {
		beneficiary_id: beneficiary.beneficiaryId,
		name: beneficiary.name,
		account_number: beneficiary.accountNumber,
		bank_code: beneficiary.bankCode,
		created_at: beneficiary.createdAt.toISOString(),
	};
}

export function presentPayment(payment: Payment) {
	return {
		payment_id: payment.paymentId,
		amount: minorToDecimal(payment.amount, payment.currency),
		currency: payment.currency,
		beneficiary_id: payment.beneficiaryId,
		source_account_id: payment.sourceAccountId,
		status: payment.status,
		type: payment.type,
		scheduled_date: iso(payment.scheduledDate),
		created_at: payment.createdAt.toISOString(),
		completed_at: iso(payment.completedAt),
	};
}

export function presentAccountSummary(summary: AccountSummary) {
	return {
		total_accounts: summary.totalAccounts,
		balance_by_currency: decimalsByCurrency(summary.balanceByCurrency),
		accounts_by_type: summary.accountsByType,
		last_updated: summary.lastUpdated.toISOString(),
	};
}

/**
 * `total_amount` is in the only currency of the period, or `defaultCurrency`
 * when there were no payments. Amounts in different currencies do not add up,
 * so a mixed period reports `null` and leaves totals to `currency_breakdown`.
 */
export function presentStatistics(stats: PaymentStatistics, defaultCurrency: string) {
	const currencies = Object.keys(stats.currencyBreakdown);
	const totalCurrency = currencies.length <= 1 ? (currencies[0] ?? defaultCurrency) : null;

	return {
		total_payments: stats.totalPayments,
		total_amount: totalCurrency === null ? null : minorToDecimal(stats.totalAmount, totalCurrency),
		status_breakdown: stats.statusBreakdown,
		currency_breakdown: decimalsByCurrency(stats.currencyBreakdown),
		type_breakdown: stats.typeBreakdown,
		period: { start: iso(stats.period.start), end: iso(stats.period.end) },
		last_updated: stats.lastUpdated.toISOString(),
	};
}
