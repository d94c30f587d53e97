export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, LOG_LEVELS, type LogLevel } from "./level.js";
export { buildRedactKeys, DEFAULT_REDACT_KEYS, redactData } from "./redact.js";
