// =============================================================================
// JSON LOGGER — one JSON object per line, for log aggregation
// =============================================================================

import type { PayrailLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./level.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Value of the `service` field. Default: `"payrail"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". Default: account numbers and secrets */
	redactKeys?: string[];
	/** Line sink. Default: stderr for warn/error, stdout otherwise. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

function serializeValue(_key: string, value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	return value;
}

/**
 * Create a structured JSON logger.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@payrail/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "payments-api" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): PayrailLogger {
	const { level = "info", service = "payrail", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...redactData(data, redactKeys),
		};

		write(JSON.stringify(entry, serializeValue), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
