import { describe, expect, it } from "vitest";
import { PayrailError } from "../error/index.js";
import {
	decimalToMinor,
	getCurrencyPrecision,
	getDecimalPlaces,
	isCurrencyCode,
	minorToDecimal,
} from "../utils/money.js";

describe("minorToDecimal", () => {
	it("formats USD with 2 decimal places", () => {
		expect(minorToDecimal(4000, "USD")).toBe("40.00");
		expect(minorToDecimal(25490, "USD")).toBe("254.90");
	});

	it("formats JPY with no decimal places", () => {
		expect(minorToDecimal(10000, "JPY")).toBe("10000");
	});

	it("formats KWD with 3 decimal places", () => {
		expect(minorToDecimal(10000, "KWD")).toBe("10.000");
	});

	it("defaults to USD", () => {
		expect(minorToDecimal(10000)).toBe("100.00");
	});
});

describe("decimalToMinor", () => {
	it("scales major units by the currency precision", () => {
		expect(decimalToMinor(60, "USD")).toBe(6000);
		expect(decimalToMinor(60.5, "EUR")).toBe(6050);
		expect(decimalToMinor(1200, "JPY")).toBe(1200);
		expect(decimalToMinor(1.234, "BHD")).toBe(1234);
	});

	it("absorbs binary floating point noise", () => {
		expect(decimalToMinor(19.99, "USD")).toBe(1999);
		expect(decimalToMinor(0.1 + 0.2, "USD")).toBe(30);
	});

	it("rejects more fractional digits than the currency carries", () => {
		expect(() => decimalToMinor(60.555, "USD")).toThrow(
			"amount 60.555 has more than 2 decimal places for USD",
		);
		expect(() => decimalToMinor(10.5, "JPY")).toThrow(PayrailError);
	});

	it("rejects non-finite input", () => {
		expect(() => decimalToMinor(Number.NaN, "USD")).toThrow("amount must be a finite number");
		expect(() => decimalToMinor(Number.POSITIVE_INFINITY, "USD")).toThrow(PayrailError);
	});
});

describe("currency helpers", () => {
	it("knows precision and decimal places", () => {
		expect(getCurrencyPrecision("USD")).toBe(100);
		expect(getCurrencyPrecision("KRW")).toBe(1);
		expect(getCurrencyPrecision("BHD")).toBe(1000);
		expect(getDecimalPlaces("GBP")).toBe(2);
		expect(getDecimalPlaces("JPY")).toBe(0);
		expect(getDecimalPlaces("KWD")).toBe(3);
	});

	it("accepts only three upper-case letters as a currency code", () => {
		expect(isCurrencyCode("USD")).toBe(true);
		expect(isCurrencyCode("usd")).toBe(false);
		expect(isCurrencyCode("US")).toBe(false);
		expect(isCurrencyCode("USDT")).toBe(false);
		expect(isCurrencyCode("U5D")).toBe(false);
	});
});
