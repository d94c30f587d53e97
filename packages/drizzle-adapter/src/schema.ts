import { sql } from "drizzle-orm";
import { bigint, check, index, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

// Typed drizzle views of the payrail tables, for applications that query them
// with drizzle's builder. Column names match `generateSchemaSql` in payrail.

// =============================================================================
// ACCOUNTS
// =============================================================================

export const accounts = pgTable(
	"accounts",
	{
		accountId: uuid("account_id").primaryKey(),
		accountType: text("account_type").notNull(),
		balance: bigint("balance", { mode: "number" }).notNull().default(0),
		currency: text("currency").notNull(),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [check("accounts_balance_check", sql`${table.balance} >= 0`)],
);

export type AccountRow = typeof accounts.$inferSelect;
export type AccountInsert = typeof accounts.$inferInsert;

// =============================================================================
// BENEFICIARIES
// =============================================================================

export const beneficiaries = pgTable(
	"beneficiaries",
	{
		beneficiaryId: uuid("beneficiary_id").primaryKey(),
		name: text("name").notNull(),
		accountNumber: text("account_number").notNull(),
		bankCode: text("bank_code").notNull(),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [index("idx_beneficiaries_bank_code").on(table.bankCode)],
);

export type BeneficiaryRow = typeof beneficiaries.$inferSelect;
export type BeneficiaryInsert = typeof beneficiaries.$inferInsert;

// =============================================================================
// PAYMENTS
// =============================================================================
// Both foreign keys are RESTRICT: referenced rows cannot be deleted.

export const payments = pgTable(
	"payments",
	{
		paymentId: uuid("payment_id").primaryKey(),
		amount: bigint("amount", { mode: "number" }).notNull(),
		currency: text("currency").notNull(),
		beneficiaryId: uuid("beneficiary_id")
			.notNull()
			.references(() => beneficiaries.beneficiaryId, { onDelete: "restrict" }),
		sourceAccountId: uuid("source_account_id")
			.notNull()
			.references(() => accounts.accountId, { onDelete: "restrict" }),
		status: text("status").notNull(),
		type: text("type").notNull(),
		scheduledDate: timestamp("scheduled_date", { withTimezone: true }),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
		completedAt: timestamp("completed_at", { withTimezone: true }),
	},
	(table) => [
		check("payments_amount_check", sql`${table.amount} > 0`),
		index("idx_payments_status").on(table.status),
		index("idx_payments_beneficiary_id").on(table.beneficiaryId),
		index("idx_payments_source_account_id").on(table.sourceAccountId),
		index("idx_payments_created_at").on(table.createdAt),
	],
);

export type PaymentRow = typeof payments.$inferSelect;
export type PaymentInsert = typeof payments.$inferInsert;
