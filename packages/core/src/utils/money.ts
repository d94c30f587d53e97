import { PayrailError } from "../error/index.js";

const CURRENCY_CODE = /^[A-Z]{3}$/;

/** True for a three-letter upper-case code such as "USD". */
export function isCurrencyCode(value: string): boolean {
	return CURRENCY_CODE.test(value);
}

/**
 * Convert smallest units (cents) to a decimal string.
 * 25490 → "254.90"
 */
export function minorToDecimal(amount: number, currency = "USD"): string {
	const precision = getCurrencyPrecision(currency);
	return (amount / precision).toFixed(getDecimalPlaces(currency));
}

/**
 * Convert a major-unit amount to smallest units.
 * 60.5 USD → 6050, 1200 JPY → 1200
 *
 * Throws INVALID_ARGUMENT for non-finite input or more fractional digits than
 * the currency carries (60.555 USD).
 */
export function decimalToMinor(amount: number, currency = "USD"): number {
	if (!Number.isFinite(amount)) {
		throw PayrailError.invalidArgument(`amount must be a finite number, got ${amount}`, {
			amount,
		});
	}
	const precision = getCurrencyPrecision(currency);
	const scaled = amount * precision;
	const minor = Math.round(scaled);
	if (Math.abs(scaled - minor) > 1e-6) {
		throw PayrailError.invalidArgument(
			`amount ${amount} has more than ${getDecimalPlaces(currency)} decimal places for ${currency}`,
			{ amount, currency },
		);
	}
	if (!Number.isSafeInteger(minor)) {
		throw PayrailError.invalidArgument(`amount ${amount} is out of range`, { amount });
	}
	return minor;
}

/**
 * Subunits per major unit.
 * USD → 100 (100 cents = 1 dollar), JPY → 1, KWD → 1000
 */
export function getCurrencyPrecision(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 1;
		case "BHD":
		case "KWD":
			return 1000;
		default:
			return 100;
	}
}

export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 0;
		case "BHD":
		case "KWD":
			return 3;
		default:
			return 2;
	}
}
