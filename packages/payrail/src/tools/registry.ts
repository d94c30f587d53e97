// =============================================================================
// TOOL REGISTRY — static table of remotely callable operations
// =============================================================================
// Tools take snake_case JSON arguments with major-unit decimal amounts and
// answer with a text envelope. Failures never throw out of callTool.

import {
	ACCOUNT_TYPES,
	decimalToMinor,
	type ImmediatePaymentType,
	PAYMENT_STATUSES,
	PAYMENT_TYPES,
	type PaymentType,
	PayrailError,
} from "@payrail/core";
import type { Payrail } from "../payrail/base.js";
import {
	optionalDate,
	optionalEnum,
	optionalInteger,
	optionalNumber,
	optionalString,
	requireDate,
	requireEnum,
	requireNumber,
	requireObjectList,
	requireString,
	type ToolArgs,
	toToolArgs,
} from "./args.js";
import {
	presentAccount,
	presentAccountSummary,
	presentBalance,
	presentBeneficiary,
	presentPayment,
	presentStatistics,
} from "./present.js";

// =============================================================================
// TYPES
// =============================================================================

export interface JsonSchema {
	type: "object" | "array" | "string" | "number" | "integer";
	description?: string;
	properties?: Record<string, JsonSchema>;
	required?: string[];
	items?: JsonSchema;
	enum?: readonly string[];
	format?: "date-time";
	additionalProperties?: boolean;
}

export interface ToolDefinition {
	name: string;
	description: string;
	inputSchema: JsonSchema;
	handler: (payrail: Payrail, args: ToolArgs) => Promise<unknown>;
}

export interface ToolContent {
	type: "text";
	text: string;
}

export interface ToolResult {
	content: ToolContent[];
	isError?: boolean;
}

const SORT_ORDERS = ["asc", "desc"] as const;

const ACCOUNT_SORT_FIELDS = {
	balance: "balance",
	created_at: "createdAt",
	account_type: "accountType",
} as const;

const PAYMENT_SORT_FIELDS = {
	created_at: "createdAt",
	amount: "amount",
	scheduled_date: "scheduledDate",
} as const;

const IMMEDIATE_PAYMENT_TYPES = PAYMENT_TYPES.filter(
	(type): type is ImmediatePaymentType => type !== "SCHEDULED",
);

// =============================================================================
// SCHEMA HELPERS
// =============================================================================

const text = (description: string): JsonSchema => ({ type: "string", description });
const decimal = (description: string): JsonSchema => ({ type: "number", description });
const date = (description: string): JsonSchema => ({
	type: "string",
	format: "date-time",
	description,
});
const oneOf = (values: readonly string[], description: string): JsonSchema => ({
	type: "string",
	enum: values,
	description,
});

function objectSchema(properties: Record<string, JsonSchema>, required: string[] = []): JsonSchema {
	return { type: "object", properties, required, additionalProperties: false };
}

const ACCOUNT_INPUT = objectSchema(
	{
		account_type: oneOf(ACCOUNT_TYPES, "Kind of account"),
		balance: decimal("Opening balance in major units, e.g. 100.00"),
		currency: text("ISO 4217 code; defaults to the configured currency"),
	},
	["account_type", "balance"],
);

const PAYMENT_INPUT = {
	amount: decimal("Amount in major units, e.g. 60.00"),
	currency: text("ISO 4217 code"),
	beneficiary_id: text("Beneficiary receiving the payment"),
	source_account_id: text("Account to debit"),
};

// =============================================================================
// ARGUMENT MAPPING
// =============================================================================

function readAccountParams(payrail: Payrail, args: ToolArgs) {
	const currency = optionalString(args, "currency") ?? payrail.$context.options.currency;
	return {
		accountType: requireEnum(args, "account_type", ACCOUNT_TYPES),
		balance: decimalToMinor(requireNumber(args, "balance"), currency),
		currency,
	};
}

function readPaymentParams(args: ToolArgs) {
	const currency = requireString(args, "currency");
	return {
		amount: decimalToMinor(requireNumber(args, "amount"), currency),
		currency,
		beneficiaryId: requireString(args, "beneficiary_id"),
		sourceAccountId: requireString(args, "source_account_id"),
	};
}

/** Amount filters are read in the filter currency, or the default one. */
function optionalAmount(args: ToolArgs, key: string, currency: string): number | undefined {
	const value = optionalNumber(args, key);
	return value === undefined ? undefined : decimalToMinor(value, currency);
}

// =============================================================================
// TOOLS
// =============================================================================

export const TOOLS: readonly ToolDefinition[] = [
	{
		name: "list_accounts",
		description: "List accounts, optionally filtered by type, currency and balance range",
		inputSchema: objectSchema({
			account_type: oneOf(ACCOUNT_TYPES, "Only accounts of this type"),
			currency: text("Only accounts in this currency"),
			min_balance: decimal("Inclusive lower balance bound"),
			max_balance: decimal("Inclusive upper balance bound"),
			sort_by: oneOf(Object.keys(ACCOUNT_SORT_FIELDS), "Default: balance"),
			sort_order: oneOf(SORT_ORDERS, "Default: desc"),
		}),
		handler: async (payrail, args) => {
			const currency = optionalString(args, "currency");
			const amountCurrency = currency ?? payrail.$context.options.currency;
			const sortBy = optionalEnum(args, "sort_by", ["balance", "created_at", "account_type"]);
			const accounts = await payrail.accounts.list({
				accountType: optionalEnum(args, "account_type", ACCOUNT_TYPES),
				currency,
				minBalance: optionalAmount(args, "min_balance", amountCurrency),
				maxBalance: optionalAmount(args, "max_balance", amountCurrency),
				sortBy: sortBy === undefined ? undefined : ACCOUNT_SORT_FIELDS[sortBy],
				sortOrder: optionalEnum(args, "sort_order", SORT_ORDERS),
			});
			return accounts.map(presentAccount);
		},
	},
	{
		name: "get_account_summary",
		description: "Count accounts and total balances per currency",
		inputSchema: objectSchema({}),
		handler: async (payrail) => presentAccountSummary(await payrail.accounts.summary()),
	},
	{
		name: "add_account",
		description: "Open an account with an opening balance",
		inputSchema: ACCOUNT_INPUT,
		handler: async (payrail, args) =>
			presentAccount(await payrail.accounts.add(readAccountParams(payrail, args))),
	},
	{
		name: "add_multiple_accounts",
		description: "Open several accounts at once; either all are created or none",
		inputSchema: objectSchema({ accounts: { type: "array", items: ACCOUNT_INPUT } }, ["accounts"]),
		handler: async (payrail, args) => {
			const list = requireObjectList(args, "accounts").map((item) =>
				readAccountParams(payrail, item),
			);
			const accounts = await payrail.accounts.addMany(list);
			return accounts.map(presentAccount);
		},
	},
	{
		name: "get_account_balance",
		description: "Current balance of an account",
		inputSchema: objectSchema({ account_id: text("Account to read") }, ["account_id"]),
		handler: async (payrail, args) =>
			presentBalance(await payrail.accounts.getBalance(requireString(args, "account_id"))),
	},
	{
		name: "add_beneficiary",
		description: "Register a payee",
		inputSchema: objectSchema(
			{
				name: text("Payee name"),
				account_number: text("Payee account number"),
				bank_code: text("Payee bank code"),
			},
			["name", "account_number", "bank_code"],
		),
		handler: async (payrail, args) =>
			presentBeneficiary(
				await payrail.beneficiaries.add({
					name: requireString(args, "name"),
					accountNumber: requireString(args, "account_number"),
					bankCode: requireString(args, "bank_code"),
				}),
			),
	},
	{
		name: "delete_beneficiary",
		description: "Remove a payee that no payment references",
		inputSchema: objectSchema({ beneficiary_id: text("Payee to remove") }, ["beneficiary_id"]),
		handler: async (payrail, args) => {
			await payrail.beneficiaries.delete(requireString(args, "beneficiary_id"));
			return { status: "success", message: "Beneficiary deleted successfully" };
		},
	},
	{
		name: "search_beneficiaries",
		description: "Find payees by partial name or exact bank code",
		inputSchema: objectSchema({
			name: text("Case-insensitive part of the name"),
			bank_code: text("Exact bank code"),
		}),
		handler: async (payrail, args) => {
			const found = await payrail.beneficiaries.search({
				name: optionalString(args, "name"),
				bankCode: optionalString(args, "bank_code"),
			});
			return found.map(presentBeneficiary);
		},
	},
	{
		name: "initiate_payment",
		description: "Debit the source account and record a completed payment in one transaction",
		inputSchema: objectSchema(
			{
				...PAYMENT_INPUT,
				payment_type: oneOf(IMMEDIATE_PAYMENT_TYPES, "Default: IMMEDIATE"),
			},
			["amount", "currency", "beneficiary_id", "source_account_id"],
		),
		handler: async (payrail, args) =>
			presentPayment(
				await payrail.payments.initiate({
					...readPaymentParams(args),
					paymentType: optionalEnum(args, "payment_type", IMMEDIATE_PAYMENT_TYPES),
				}),
			),
	},
	{
		name: "schedule_payment",
		description: "Record a payment to run at a future date; nothing is debited now",
		inputSchema: objectSchema(
			{ ...PAYMENT_INPUT, scheduled_date: date("When the payment should run") },
			["amount", "currency", "beneficiary_id", "source_account_id", "scheduled_date"],
		),
		handler: async (payrail, args) =>
			presentPayment(
				await payrail.payments.schedule({
					...readPaymentParams(args),
					scheduledDate: requireDate(args, "scheduled_date"),
				}),
			),
	},
	{
		name: "cancel_payment",
		description: "Cancel a scheduled payment",
		inputSchema: objectSchema({ payment_id: text("Scheduled payment to cancel") }, ["payment_id"]),
		handler: async (payrail, args) => {
			const payment = await payrail.payments.cancel(requireString(args, "payment_id"));
			return {
				payment_id: payment.paymentId,
				status: payment.status,
				message: "Payment cancelled successfully",
			};
		},
	},
	{
		name: "execute_scheduled_payment",
		description: "Run a scheduled payment now",
		inputSchema: objectSchema({ payment_id: text("Scheduled payment to run") }, ["payment_id"]),
		handler: async (payrail, args) =>
			presentPayment(await payrail.payments.executeScheduled(requireString(args, "payment_id"))),
	},
	{
		name: "search_payment_history",
		description: "Filter and sort payments",
		inputSchema: objectSchema({
			start_date: date("Inclusive lower bound on creation time"),
			end_date: date("Inclusive upper bound on creation time"),
			min_amount: decimal("Inclusive lower amount bound"),
			max_amount: decimal("Inclusive upper amount bound"),
			currency: text("Only payments in this currency"),
			status: oneOf(PAYMENT_STATUSES, "Only payments in this status"),
			payment_type: oneOf(PAYMENT_TYPES, "Only payments of this type"),
			beneficiary_id: text("Only payments to this payee"),
			source_account_id: text("Only payments from this account"),
			sort_by: oneOf(Object.keys(PAYMENT_SORT_FIELDS), "Default: created_at"),
			sort_order: oneOf(SORT_ORDERS, "Default: desc"),
			limit: { type: "integer", description: "Maximum number of payments" },
		}),
		handler: async (payrail, args) => {
			const currency = optionalString(args, "currency");
			const amountCurrency = currency ?? payrail.$context.options.currency;
			const sortBy = optionalEnum(args, "sort_by", ["created_at", "amount", "scheduled_date"]);
			const paymentType: PaymentType | undefined = optionalEnum(args, "payment_type", PAYMENT_TYPES);

			const payments = await payrail.payments.search(
				{
					startDate: optionalDate(args, "start_date"),
					endDate: optionalDate(args, "end_date"),
					minAmount: optionalAmount(args, "min_amount", amountCurrency),
					maxAmount: optionalAmount(args, "max_amount", amountCurrency),
					currency,
					status: optionalEnum(args, "status", PAYMENT_STATUSES),
					paymentType,
					beneficiaryId: optionalString(args, "beneficiary_id"),
					sourceAccountId: optionalString(args, "source_account_id"),
				},
				{
					sortBy: sortBy === undefined ? undefined : PAYMENT_SORT_FIELDS[sortBy],
					sortOrder: optionalEnum(args, "sort_order", SORT_ORDERS),
					limit: optionalInteger(args, "limit"),
				},
			);
			return payments.map(presentPayment);
		},
	},
	{
		name: "get_payment_statistics",
		description: "Totals and breakdowns of payments created in a period",
		inputSchema: objectSchema({
			start_date: date("Inclusive lower bound on creation time"),
			end_date: date("Inclusive upper bound on creation time"),
		}),
		handler: async (payrail, args) => {
			const stats = await payrail.payments.statistics({
				startDate: optionalDate(args, "start_date"),
				endDate: optionalDate(args, "end_date"),
			});
			return presentStatistics(stats, payrail.$context.options.currency);
		},
	},
];

const TOOLS_BY_NAME = new Map(TOOLS.map((tool) => [tool.name, tool]));

// =============================================================================
// DISPATCH
// =============================================================================

function success(result: unknown): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
}

function failure(error: PayrailError): ToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify({ error: error.toJSON() }, null, 2) }],
		isError: true,
	};
}

/**
 * Run a tool by name. Errors come back as an `isError` envelope carrying the
 * error code; anything that is not a PayrailError is logged and reported as
 * INTERNAL.
 *
 * @example
 * ```ts
 * const result = await callTool(payrail, "get_account_balance", { account_id: id });
 * const body = JSON.parse(result.content[0].text);
 * ```
 */
export async function callTool(payrail: Payrail, name: string, args?: unknown): Promise<ToolResult> {
	const tool = TOOLS_BY_NAME.get(name);
	if (!tool) {
		return failure(PayrailError.notFound(`Unknown tool: ${name}`, { tool: name }));
	}

	try {
		return success(await tool.handler(payrail, toToolArgs(args)));
	} catch (error) {
		if (error instanceof PayrailError) {
			return failure(error);
		}
		payrail.$context.logger.error("Tool call failed", {
			tool: name,
			error: error instanceof Error ? error.message : String(error),
		});
		return failure(PayrailError.internal("Internal server error"));
	}
}
