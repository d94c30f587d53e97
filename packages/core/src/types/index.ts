export type { Account, AccountBalance, AccountSummary, AccountType } from "./account.js";
export { ACCOUNT_TYPES } from "./account.js";
export type { Beneficiary } from "./beneficiary.js";
export type {
	IsolationLevel,
	LockMode,
	PayrailAdvancedOptions,
	PayrailLogger,
	PayrailOptions,
} from "./config.js";
export type {
	PayrailContext,
	ResolvedAdvancedOptions,
	ResolvedPayrailOptions,
} from "./context.js";
export type {
	ImmediatePaymentType,
	Payment,
	PaymentStatistics,
	PaymentStatus,
	PaymentType,
} from "./payment.js";
export { PAYMENT_STATUSES, PAYMENT_TYPES } from "./payment.js";
export type { ColumnDefinition, TableDefinition } from "./schema.js";
