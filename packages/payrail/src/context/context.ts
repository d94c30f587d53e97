// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds PayrailContext from PayrailOptions. Resolves the adapter and logger
// and merges config defaults.

import type {
	PayrailAdapter,
	PayrailContext,
	PayrailOptions,
	ResolvedAdvancedOptions,
	ResolvedPayrailOptions,
} from "@payrail/core";
import { createConsoleLogger } from "@payrail/core/logger";
import { DEFAULT_BLOCKED_CURRENCIES, validateConfig } from "../config/index.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	transactionTimeoutMs: 5000,
	lockTimeoutMs: 3000,
	lockMode: "pessimistic",
	isolationLevel: "read committed",
	maxPaymentAmount: 1_000_000_000_00,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export function buildContext(options: PayrailOptions): PayrailContext {
	validateConfig(options);

	const adapter: PayrailAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const overrides = options.advanced ?? {};
	const advanced: ResolvedAdvancedOptions = {
		transactionTimeoutMs: overrides.transactionTimeoutMs ?? DEFAULT_ADVANCED.transactionTimeoutMs,
		lockTimeoutMs: overrides.lockTimeoutMs ?? DEFAULT_ADVANCED.lockTimeoutMs,
		lockMode: overrides.lockMode ?? DEFAULT_ADVANCED.lockMode,
		isolationLevel: overrides.isolationLevel ?? DEFAULT_ADVANCED.isolationLevel,
		maxPaymentAmount: overrides.maxPaymentAmount ?? DEFAULT_ADVANCED.maxPaymentAmount,
	};

	const schema = options.schema ?? "public";
	const resolvedOptions: ResolvedPayrailOptions = {
		currency: options.currency ?? "USD",
		blockedCurrencies: new Set(
			(options.blockedCurrencies ?? DEFAULT_BLOCKED_CURRENCIES).map((code) => code.toUpperCase()),
		),
		schema,
		advanced,
	};

	// SQL adapters qualify table names from their options
	adapter.options.schema = schema;

	return { adapter, options: resolvedOptions, logger };
}
