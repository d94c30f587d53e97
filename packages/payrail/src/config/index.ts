import { readFileSync } from "node:fs";
import type { IsolationLevel, LockMode, PayrailOptions } from "@payrail/core";
import { isCurrencyCode, PayrailError } from "@payrail/core";
import { isLogLevel, type LogLevel } from "@payrail/core/logger";

function loadCurrencyCodes(): ReadonlySet<string> {
	const parsed: unknown = JSON.parse(
		readFileSync(new URL("./currencies.json", import.meta.url), "utf8"),
	);
	if (!Array.isArray(parsed)) {
		throw new Error("currencies.json must contain an array of currency codes");
	}
	const codes = new Set<string>();
	for (const code of parsed) {
		if (typeof code !== "string") {
			throw new Error("currencies.json must contain an array of currency codes");
		}
		codes.add(code);
	}
	return codes;
}

/** ISO 4217 codes accepted as the default account currency. */
export const VALID_CURRENCIES = loadCurrencyCodes();

export const DEFAULT_BLOCKED_CURRENCIES: readonly string[] = [
	"RUB",
	"SYP",
	"IRR",
	"VES",
	"SDG",
	"CUP",
];

export const LOCK_MODES: readonly LockMode[] = ["pessimistic", "optimistic"];

export const ISOLATION_LEVELS: readonly IsolationLevel[] = [
	"read committed",
	"repeatable read",
	"serializable",
];

const SCHEMA_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function invalid(message: string): PayrailError {
	return PayrailError.invalidArgument(`payrail config: ${message}`);
}

function assertPositive(value: number | undefined, name: string): void {
	if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
		throw invalid(`'advanced.${name}' must be a positive finite number`);
	}
}

/**
 * Validate payrail options at runtime.
 * Throws INVALID_ARGUMENT prefixed with "payrail config:" on the first problem found.
 */
export function validateConfig(options: PayrailOptions): void {
	if (!options.database) {
		throw invalid("'database' adapter is required");
	}

	if (options.currency !== undefined && !VALID_CURRENCIES.has(options.currency)) {
		throw invalid(`unknown currency "${options.currency}". Use a valid ISO 4217 code.`);
	}

	for (const code of options.blockedCurrencies ?? []) {
		if (!isCurrencyCode(code.toUpperCase())) {
			throw invalid(`'blockedCurrencies' entries must be 3-letter currency codes, got "${code}"`);
		}
	}

	const adv = options.advanced;
	if (adv) {
		assertPositive(adv.transactionTimeoutMs, "transactionTimeoutMs");
		assertPositive(adv.lockTimeoutMs, "lockTimeoutMs");
		if (
			adv.maxPaymentAmount !== undefined &&
			(!Number.isSafeInteger(adv.maxPaymentAmount) || adv.maxPaymentAmount <= 0)
		) {
			throw invalid("'advanced.maxPaymentAmount' must be a positive integer");
		}
		if (adv.lockMode !== undefined && !LOCK_MODES.includes(adv.lockMode)) {
			throw invalid(`'advanced.lockMode' must be one of: ${LOCK_MODES.join(", ")}`);
		}
		if (adv.isolationLevel !== undefined && !ISOLATION_LEVELS.includes(adv.isolationLevel)) {
			throw invalid(`'advanced.isolationLevel' must be one of: ${ISOLATION_LEVELS.join(", ")}`);
		}
	}

	if (options.schema !== undefined && !SCHEMA_NAME.test(options.schema)) {
		throw invalid(
			`'schema' must contain only alphanumeric characters and underscores, got "${options.schema}"`,
		);
	}
}

/**
 * Identity function for typed config files. Validates before returning.
 *
 * @example
 * ```ts
 * import { definePayrailConfig } from "payrail/config";
 *
 * export default definePayrailConfig({
 *   database: drizzleAdapter(db),
 *   currency: "EUR",
 * });
 * ```
 */
export function definePayrailConfig(options: PayrailOptions): PayrailOptions {
	validateConfig(options);
	return options;
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export type LogFormat = "pretty" | "json";

export interface EnvConfig {
	databaseUrl?: string;
	schema?: string;
	currency?: string;
	blockedCurrencies?: string[];
	lockMode?: LockMode;
	logLevel: LogLevel;
	logFormat: LogFormat;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

/**
 * Read payrail settings from environment variables.
 * Unset or blank variables fall back to library defaults.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
	const lockModeRaw = readEnv(env, "PAYRAIL_LOCK_MODE");
	const lockMode = LOCK_MODES.find((mode) => mode === lockModeRaw);
	if (lockModeRaw !== undefined && lockMode === undefined) {
		throw invalid(`PAYRAIL_LOCK_MODE must be one of: ${LOCK_MODES.join(", ")}, got "${lockModeRaw}"`);
	}

	const logLevel = readEnv(env, "PAYRAIL_LOG_LEVEL") ?? "info";
	if (!isLogLevel(logLevel)) {
		throw invalid(`PAYRAIL_LOG_LEVEL must be one of: debug, info, warn, error, got "${logLevel}"`);
	}

	const logFormat = readEnv(env, "PAYRAIL_LOG_FORMAT") ?? "pretty";
	if (logFormat !== "pretty" && logFormat !== "json") {
		throw invalid(`PAYRAIL_LOG_FORMAT must be "pretty" or "json", got "${logFormat}"`);
	}

	const blocked = readEnv(env, "PAYRAIL_BLOCKED_CURRENCIES");

	return {
		databaseUrl: readEnv(env, "DATABASE_URL"),
		schema: readEnv(env, "PAYRAIL_SCHEMA"),
		currency: readEnv(env, "PAYRAIL_DEFAULT_CURRENCY")?.toUpperCase(),
		blockedCurrencies: blocked
			?.split(",")
			.map((code) => code.trim().toUpperCase())
			.filter((code) => code.length > 0),
		lockMode,
		logLevel,
		logFormat,
	};
}
