// =============================================================================
// STORE ERROR CLASSIFICATION
// =============================================================================
// Maps driver errors (PostgreSQL SQLSTATE codes, Node socket errors) onto
// PayrailError codes so callers see one taxonomy whatever the store.

import { PayrailError } from "../error/index.js";

const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"ETIMEDOUT",
	"EPIPE",
	// admin_shutdown, crash_shutdown, cannot_connect_now
	"57P01",
	"57P02",
	"57P03",
]);

// pg reports pool and socket failures without a SQLSTATE
const CONNECTION_MESSAGE = /Connection terminated|timeout exceeded when trying to connect/i;

function errorCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	// Query builders may wrap the driver error
	if ("cause" in error && error.cause !== error) {
		return errorCode(error.cause);
	}
	return undefined;
}

/**
 * Convert an error thrown by a store into a PayrailError.
 * PayrailErrors pass through untouched; unknown errors are returned as-is.
 */
export function classifyStoreError(error: unknown): unknown {
	if (error instanceof PayrailError) return error;

	const code = errorCode(error);
	if (code === undefined) {
		if (error instanceof Error && CONNECTION_MESSAGE.test(error.message)) {
			return PayrailError.storeUnavailable(error.message, error);
		}
		return error;
	}

	if (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08")) {
		return PayrailError.storeUnavailable(`Ledger store unavailable (${code})`, error);
	}

	switch (code) {
		// query_canceled (statement_timeout), lock_not_available (lock_timeout)
		case "57014":
		case "55P03":
			return PayrailError.transactionTimeout(`Transaction timed out (${code})`, error);
		case "23505":
			return PayrailError.constraintViolation(
				"Unique constraint violated",
				{ constraint: "unique" },
				error,
			);
		case "23503":
			return PayrailError.constraintViolation(
				"Foreign key constraint violated",
				{ constraint: "foreign_key" },
				error,
			);
		case "23514":
			return PayrailError.constraintViolation(
				"Check constraint violated",
				{ constraint: "check" },
				error,
			);
		case "40001":
		case "40P01":
			return PayrailError.conflict(`Concurrent update conflict (${code})`, {
				cause: error,
				transient: true,
			});
		default:
			return error;
	}
}
