// Store contract
export * from "./db/index.js";

// Errors
export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	isPayrailError,
	PayrailError,
	type PayrailErrorCode,
	type PayrailErrorOptions,
	type RawErrorCode,
} from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
