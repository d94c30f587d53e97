// =============================================================================
// CONSOLE LOGGER — Built-in PayrailLogger backed by console.*
// =============================================================================

import type { PayrailLogger } from "../types/config.js";
import { blue, bold, dim, magenta, red, yellow } from "./colors.js";
import { LEVEL_PRIORITY, type LogLevel } from "./level.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: magenta,
	info: blue,
	warn: yellow,
	error: red,
};

export interface ConsoleLoggerOptions {
	/** Minimum level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Shown before each message. Default: `"payrail"` */
	prefix?: string;
	/** Include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". Default: account numbers and secrets */
	redactKeys?: string[];
	/** Send every level to stderr, leaving stdout to command output. Default: `false` */
	stderr?: boolean;
}

type ConsoleMethod = "log" | "warn" | "error";

function consoleMethod(lvl: LogLevel, stderr: boolean): ConsoleMethod {
	if (lvl === "error" || stderr) return "error";
	return lvl === "warn" ? "warn" : "log";
}

/**
 * Create a human-readable logger for terminals.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@payrail/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("Payment completed", { paymentId });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): PayrailLogger {
	const { level = "info", prefix = "payrail", timestamps = true, stderr = false } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const head = timestamps ? `${dim(new Date().toISOString())} ` : "";
		const line = `${head}${LEVEL_COLOR[lvl](bold(lvl.toUpperCase().padEnd(5)))} [${prefix}]: ${message}`;
		const method = consoleMethod(lvl, stderr);

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
