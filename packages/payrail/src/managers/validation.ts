// =============================================================================
// INPUT VALIDATION — shared checks run before any store access
// =============================================================================

import {
	ACCOUNT_TYPES,
	type AccountType,
	isCurrencyCode,
	type PayrailContext,
	PayrailError,
} from "@payrail/core";

export function assertCurrency(currency: string): void {
	if (!isCurrencyCode(currency)) {
		throw PayrailError.invalidArgument(
			`currency must be a 3-letter upper-case ISO 4217 code, got "${currency}"`,
			{ currency },
		);
	}
}

/** Amounts are positive integers of minor units, capped by `advanced.maxPaymentAmount`. */
export function assertPaymentAmount(ctx: PayrailContext, amount: number): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw PayrailError.invalidArgument(
			`amount must be a positive integer in minor units, got ${amount}`,
			{ amount },
		);
	}
	const max = ctx.options.advanced.maxPaymentAmount;
	if (amount > max) {
		throw PayrailError.invalidArgument(`amount ${amount} exceeds the maximum of ${max}`, {
			amount,
			maxPaymentAmount: max,
		});
	}
}

export function assertNotBlocked(ctx: PayrailContext, currency: string): void {
	if (ctx.options.blockedCurrencies.has(currency)) {
		ctx.logger.warn("Payment blocked", { currency });
		throw PayrailError.paymentBlocked(currency);
	}
}

/** Validation steps shared by immediate and scheduled payments. */
export function validatePaymentRequest(
	ctx: PayrailContext,
	params: { amount: number; currency: string },
): void {
	assertPaymentAmount(ctx, params.amount);
	assertCurrency(params.currency);
	assertNotBlocked(ctx, params.currency);
}

export function assertAccountType(value: string): AccountType {
	const match = ACCOUNT_TYPES.find((type) => type === value);
	if (match === undefined) {
		throw PayrailError.invalidArgument(
			`accountType must be one of: ${ACCOUNT_TYPES.join(", ")}, got "${value}"`,
			{ accountType: value },
		);
	}
	return match;
}

export function assertBalance(balance: number): void {
	if (!Number.isSafeInteger(balance) || balance < 0) {
		throw PayrailError.invalidArgument(
			`balance must be a non-negative integer in minor units, got ${balance}`,
			{ balance },
		);
	}
}

/** Trims `value` and rejects an empty result. */
export function requireText(value: string, field: string): string {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw PayrailError.invalidArgument(`${field} must not be empty`, { field });
	}
	return trimmed;
}
