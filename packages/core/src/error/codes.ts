// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP-style status codes and default messages.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change so that a later retry can succeed.
	 *
	 * - `true`: balance may grow, a row may appear, the store may come back.
	 * - `false` (default): the same request will fail the same way.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient errors
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 400, transient: true },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: true },
	ACCOUNT_NOT_FOUND: { message: "Account not found", status: 404, transient: true },
	BENEFICIARY_NOT_FOUND: { message: "Beneficiary not found", status: 404, transient: true },
	PAYMENT_NOT_FOUND: { message: "Payment not found", status: 404, transient: true },
	STORE_UNAVAILABLE: { message: "Ledger store unavailable", status: 503, transient: true },
	TRANSACTION_TIMEOUT: { message: "Transaction timed out", status: 504, transient: true },

	// Deterministic errors
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	PAYMENT_BLOCKED: { message: "Payment blocked", status: 403, transient: false },
	INVALID_STATE_TRANSITION: {
		message: "Invalid payment state transition",
		status: 409,
		transient: false,
	},
	CONFLICT: { message: "Resource conflict", status: 409, transient: false },
	CONSTRAINT_VIOLATION: { message: "Constraint violation", status: 409, transient: false },
	TRANSACTION_INTEGRITY: {
		message: "Transaction integrity violated",
		status: 500,
		transient: false,
	},
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
