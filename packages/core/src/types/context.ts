import type { PayrailAdapter } from "../db/adapter.js";
import type { IsolationLevel, LockMode, PayrailLogger } from "./config.js";

export interface PayrailContext {
	adapter: PayrailAdapter;
	options: ResolvedPayrailOptions;
	logger: PayrailLogger;
}

export interface ResolvedPayrailOptions {
	currency: string;
	/** Upper-cased, de-duplicated */
	blockedCurrencies: ReadonlySet<string>;
	schema: string;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	transactionTimeoutMs: number;
	lockTimeoutMs: number;
	lockMode: LockMode;
	isolationLevel: IsolationLevel;
	maxPaymentAmount: number;
}
