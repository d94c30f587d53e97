import type { PayrailLogger } from "@payrail/core";
import { createConsoleLogger, createJsonLogger } from "@payrail/core/logger";
import { createPooledAdapter } from "@payrail/drizzle-adapter";
import { createPayrail, type EnvConfig, loadEnvConfig, type Payrail } from "payrail";

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Logger picked by PAYRAIL_LOG_FORMAT. Both formats write to stderr so tool
 * envelopes on stdout stay parseable.
 */
export function createCliLogger(
	config: Pick<EnvConfig, "logLevel" | "logFormat">,
	write: (line: string) => void = (line) => {
		process.stderr.write(`${line}\n`);
	},
): PayrailLogger {
	if (config.logFormat === "json") {
		return createJsonLogger({ level: config.logLevel, service: "payrail-cli", write });
	}
	return createConsoleLogger({ level: config.logLevel, prefix: "payrail-cli", stderr: true });
}

// =============================================================================
// DATABASE
// =============================================================================

export function resolveDatabaseUrl(config: EnvConfig, urlOption?: string): string {
	const url = urlOption ?? config.databaseUrl;
	if (!url) {
		throw new Error("No DATABASE_URL: set DATABASE_URL or pass --url");
	}
	return url;
}

export interface RunOptions {
	url?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * Open a pooled payrail instance from the environment, run `fn`, and close
 * the pool whatever the outcome.
 */
export async function withPayrail<T>(
	fn: (payrail: Payrail) => Promise<T>,
	options: RunOptions = {},
): Promise<T> {
	const config = loadEnvConfig(options.env ?? process.env);
	const { adapter, close } = createPooledAdapter({
		connectionString: resolveDatabaseUrl(config, options.url),
	});

	try {
		const payrail = createPayrail({
			database: adapter,
			logger: createCliLogger(config),
			schema: config.schema,
			currency: config.currency,
			blockedCurrencies: config.blockedCurrencies,
			advanced: config.lockMode ? { lockMode: config.lockMode } : undefined,
		});
		return await fn(payrail);
	} finally {
		await close();
	}
}

// =============================================================================
// ERRORS
// =============================================================================

/** Mask connection strings and credentials before an error reaches the terminal. */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}
