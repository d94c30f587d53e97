import type { PayrailAdapter } from "../db/adapter.js";

export type LockMode = "pessimistic" | "optimistic";

export type IsolationLevel = "read committed" | "repeatable read" | "serializable";

export interface PayrailOptions {
	/** Ledger store adapter instance or factory function */
	database: PayrailAdapter | (() => PayrailAdapter);

	/** Default currency for new accounts (default: "USD") */
	currency?: string;

	/** Currencies that payments may never be made in. Default: RUB, SYP, IRR, VES, SDG, CUP */
	blockedCurrencies?: string[];

	/** PostgreSQL schema holding the payrail tables. Default: "public" */
	schema?: string;

	/** Advanced configuration */
	advanced?: PayrailAdvancedOptions;

	/** Custom logger */
	logger?: PayrailLogger;
}

export interface PayrailAdvancedOptions {
	/** Statement timeout in ms. Default: 5000 */
	transactionTimeoutMs?: number;
	/** Lock wait timeout in ms. Default: 3000 */
	lockTimeoutMs?: number;
	/**
	 * 'pessimistic' locks the source account row (SELECT ... FOR UPDATE) before the funds check.
	 * 'optimistic' skips the lock and relies on the conditional debit alone.
	 * Both modes run the debit as `balance = balance - amount WHERE balance >= amount`.
	 * Default: 'pessimistic'
	 */
	lockMode?: LockMode;
	/** Isolation level for payment transactions. Default: 'read committed' */
	isolationLevel?: IsolationLevel;
	/** Largest single payment in smallest units. Default: 1_000_000_000_00 */
	maxPaymentAmount?: number;
}

export interface PayrailLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
