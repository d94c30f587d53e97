import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "../logger/console-logger.js";
import { createJsonLogger } from "../logger/json-logger.js";
import type { LogLevel } from "../logger/level.js";
import { isLogLevel } from "../logger/level.js";
import { buildRedactKeys, redactData } from "../logger/redact.js";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("redactData", () => {
	it("redacts default keys, including nested ones, without mutating input", () => {
		const data = { name: "Ada", accountNumber: "GB00-1234", nested: { token: "test-secret" } };
		const result = redactData(data, buildRedactKeys());

		expect(result).toEqual({
			name: "Ada",
			accountNumber: "[REDACTED]",
			nested: { token: "[REDACTED]" },
		});
		expect(data.accountNumber).toBe("GB00-1234");
	});

	it("returns the same object when nothing needs redacting", () => {
		const data = { paymentId: "pay-1" };
		expect(redactData(data, buildRedactKeys())).toBe(data);
	});

	it("uses only the caller's keys when given", () => {
		expect(redactData({ accountNumber: "1", iban: "2" }, buildRedactKeys(["iban"]))).toEqual({
			accountNumber: "1",
			iban: "[REDACTED]",
		});
	});
});

describe("createJsonLogger", () => {
	function capture(level?: LogLevel) {
		const lines: { line: string; level: LogLevel }[] = [];
		const logger = createJsonLogger({
			level,
			service: "test-service",
			write: (line, lvl) => lines.push({ line, level: lvl }),
		});
		return { logger, lines };
	}

	it("writes one JSON object per entry with redacted data", () => {
		const { logger, lines } = capture();
		logger.info("Beneficiary added", { beneficiaryId: "ben-1", account_number: "12345678" });

		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0]?.line ?? "");
		expect(entry).toMatchObject({
			level: "info",
			service: "test-service",
			message: "Beneficiary added",
			beneficiaryId: "ben-1",
			account_number: "[REDACTED]",
		});
	});

	it("filters entries below the minimum level", () => {
		const { logger, lines } = capture("warn");
		logger.debug("noise");
		logger.info("noise");
		logger.warn("Payment rejected");
		logger.error("Integrity failure");

		expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
	});

	it("serializes Error values by name and message", () => {
		const { logger, lines } = capture();
		logger.error("Tool failed", { error: new TypeError("bad input") });

		const entry: unknown = JSON.parse(lines[0]?.line ?? "");
		expect(entry).toMatchObject({ error: { name: "TypeError", message: "bad input" } });
	});
});

describe("createConsoleLogger", () => {
	it("routes levels to console methods and includes the prefix", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = createConsoleLogger({ timestamps: false, prefix: "ledger" });

		logger.info("Account added");
		logger.warn("Payment blocked", { currency: "RUB" });

		expect(log).toHaveBeenCalledWith(expect.stringContaining("[ledger]: Account added"));
		expect(warn).toHaveBeenCalledWith(expect.stringContaining("[ledger]: Payment blocked"), {
			currency: "RUB",
		});
	});

	it("sends every level to stderr when asked", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = createConsoleLogger({ timestamps: false, stderr: true });

		logger.info("Schema applied");

		expect(log).not.toHaveBeenCalled();
		expect(error).toHaveBeenCalledWith(expect.stringContaining("[payrail]: Schema applied"));
	});

	it("suppresses debug output at the default level", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		createConsoleLogger().debug("hidden");
		expect(log).not.toHaveBeenCalled();
	});
});

describe("isLogLevel", () => {
	it("accepts known levels only", () => {
		expect(isLogLevel("warn")).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
	});
});
