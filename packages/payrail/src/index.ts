// =============================================================================
// payrail -- Main package exports
// =============================================================================

// Main factory
export { createPayrail, type Payrail } from "./payrail/base.js";

// Config
export { definePayrailConfig, loadEnvConfig, type EnvConfig, type LogFormat } from "./config/index.js";
export { buildContext } from "./context/context.js";

// Schema
export { generateSchemaSql, getPayrailTables } from "./db/schema.js";
export {
	type AccountFilter,
	type AccountSort,
	type BeneficiaryFilter,
	createRepository,
	type PaymentFilter,
	type PaymentSort,
	type Repository,
} from "./db/repository.js";
export { withTransaction } from "./infrastructure/transaction.js";

// Managers
export type { AddAccountParams, ListAccountsParams } from "./managers/account-manager.js";
export type { AddBeneficiaryParams } from "./managers/beneficiary-manager.js";
export type {
	DuePaymentsResult,
	InitiatePaymentParams,
	SchedulePaymentParams,
} from "./managers/payment-manager.js";
export type { PaymentHistoryFilter, PaymentHistoryOptions } from "./managers/query-manager.js";

// Tools & resources
export {
	callTool,
	type JsonSchema,
	type ToolContent,
	type ToolDefinition,
	type ToolResult,
	TOOLS,
} from "./tools/registry.js";
export {
	RESOURCES,
	readResource,
	type ResourceContents,
	type ResourceDefinition,
} from "./tools/resources.js";

// Re-export core types and errors for convenience
export * from "@payrail/core";
