import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type PayrailErrorCode = BaseErrorCode;

export interface PayrailErrorOptions {
	cause?: unknown;
	status?: number;
	transient?: boolean;
	details?: Record<string, unknown>;
}

export class PayrailError extends Error {
	readonly code: PayrailErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the condition may change and a later retry may succeed.
	 * Nothing inside payrail retries on its own; callers use this flag to decide.
	 */
	readonly transient: boolean;

	constructor(code: PayrailErrorCode, message: string, options?: PayrailErrorOptions) {
		super(message, { cause: options?.cause });
		const raw = BASE_ERROR_CODES[code];
		this.code = code;
		this.status = options?.status ?? raw.status;
		this.transient = options?.transient ?? raw.transient;
		this.details = options?.details;
		this.name = "PayrailError";
	}

	/**
	 * Create a PayrailError from a typed code, using the registry's default
	 * message, status and transient flag unless overridden.
	 */
	static fromCode(
		code: PayrailErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): PayrailError {
		const raw = BASE_ERROR_CODES[code];
		return new PayrailError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	/** Plain object for wire responses and structured logs. */
	toJSON(): { code: PayrailErrorCode; message: string; details?: Record<string, unknown> } {
		return this.details
			? { code: this.code, message: this.message, details: this.details }
			: { code: this.code, message: this.message };
	}

	// --- Transient errors ---

	static insufficientFunds(details: {
		accountId: string;
		balance: number;
		required: number;
		currency: string;
	}) {
		return new PayrailError(
			"INSUFFICIENT_FUNDS",
			`Insufficient funds. Available: ${details.balance}, Required: ${details.required}`,
			{ details },
		);
	}

	static notFound(message = "Resource not found", details?: Record<string, unknown>) {
		return new PayrailError("NOT_FOUND", message, { details });
	}

	static accountNotFound(accountId: string) {
		return new PayrailError("ACCOUNT_NOT_FOUND", `Account not found: ${accountId}`, {
			details: { accountId },
		});
	}

	static beneficiaryNotFound(beneficiaryId: string) {
		return new PayrailError("BENEFICIARY_NOT_FOUND", `Beneficiary not found: ${beneficiaryId}`, {
			details: { beneficiaryId },
		});
	}

	static paymentNotFound(paymentId: string) {
		return new PayrailError("PAYMENT_NOT_FOUND", `Payment not found: ${paymentId}`, {
			details: { paymentId },
		});
	}

	static storeUnavailable(message = "Ledger store unavailable", cause?: unknown) {
		return new PayrailError("STORE_UNAVAILABLE", message, { cause });
	}

	static transactionTimeout(message = "Transaction timed out", cause?: unknown) {
		return new PayrailError("TRANSACTION_TIMEOUT", message, { cause });
	}

	// --- Deterministic errors ---

	static invalidArgument(message = "Invalid argument", details?: Record<string, unknown>) {
		return new PayrailError("INVALID_ARGUMENT", message, { details });
	}

	static paymentBlocked(currency: string) {
		return new PayrailError("PAYMENT_BLOCKED", `Payment blocked for the currency: ${currency}`, {
			details: { currency },
		});
	}

	static invalidStateTransition(paymentId: string, from: string, to: string) {
		return new PayrailError(
			"INVALID_STATE_TRANSITION",
			`Cannot move payment ${paymentId} from ${from} to ${to}`,
			{ details: { paymentId, from, to } },
		);
	}

	static conflict(
		message = "Conflict",
		options?: { cause?: unknown; transient?: boolean; details?: Record<string, unknown> },
	) {
		return new PayrailError("CONFLICT", message, {
			cause: options?.cause,
			transient: options?.transient,
			details: options?.details,
		});
	}

	static constraintViolation(
		message = "Constraint violation",
		details?: Record<string, unknown>,
		cause?: unknown,
	) {
		return new PayrailError("CONSTRAINT_VIOLATION", message, { details, cause });
	}

	static transactionIntegrity(
		message = "Transaction integrity violated",
		details?: Record<string, unknown>,
		cause?: unknown,
	) {
		return new PayrailError("TRANSACTION_INTEGRITY", message, { details, cause });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new PayrailError("INTERNAL", message, { cause });
	}
}

/** Narrow an unknown thrown value to a PayrailError with the given code. */
export function isPayrailError(error: unknown, code?: PayrailErrorCode): error is PayrailError {
	return error instanceof PayrailError && (code === undefined || error.code === code);
}
