// =============================================================================
// SCHEMA — payrail table definitions and PostgreSQL DDL
// =============================================================================
// One source for both stores: the memory adapter reads primary and foreign
// keys from these definitions, `generateSchemaSql` turns them into DDL.

import type { ColumnDefinition, TableDefinition } from "@payrail/core";
import { createTableResolver } from "@payrail/core/db";

const TABLES: Record<string, TableDefinition> = {
	accounts: {
		columns: {
			account_id: { type: "uuid", primaryKey: true },
			account_type: { type: "text", notNull: true },
			balance: { type: "bigint", notNull: true, default: "0", check: "balance >= 0" },
			currency: { type: "text", notNull: true },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
	},
	beneficiaries: {
		columns: {
			beneficiary_id: { type: "uuid", primaryKey: true },
			name: { type: "text", notNull: true },
			account_number: { type: "text", notNull: true },
			bank_code: { type: "text", notNull: true },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [{ name: "idx_beneficiaries_bank_code", columns: ["bank_code"] }],
	},
	payments: {
		columns: {
			payment_id: { type: "uuid", primaryKey: true },
			amount: { type: "bigint", notNull: true, check: "amount > 0" },
			currency: { type: "text", notNull: true },
			beneficiary_id: {
				type: "uuid",
				notNull: true,
				references: { table: "beneficiaries", column: "beneficiary_id" },
			},
			source_account_id: {
				type: "uuid",
				notNull: true,
				references: { table: "accounts", column: "account_id" },
			},
			status: { type: "text", notNull: true },
			type: { type: "text", notNull: true },
			scheduled_date: { type: "timestamp" },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
			completed_at: { type: "timestamp" },
		},
		indexes: [
			{ name: "idx_payments_status", columns: ["status"] },
			{ name: "idx_payments_beneficiary_id", columns: ["beneficiary_id"] },
			{ name: "idx_payments_source_account_id", columns: ["source_account_id"] },
			{ name: "idx_payments_created_at", columns: ["created_at"] },
		],
	},
};

/** Table definitions keyed by table name, in creation order. */
export function getPayrailTables(): Record<string, TableDefinition> {
	return structuredClone(TABLES);
}

// =============================================================================
// DDL GENERATION
// =============================================================================

function pgType(col: ColumnDefinition): string {
	switch (col.type) {
		case "uuid":
			return "UUID";
		case "text":
			return "TEXT";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "timestamp":
			return "TIMESTAMPTZ";
	}
}

function columnSql(name: string, col: ColumnDefinition, t: (table: string) => string): string {
	const parts = [name, pgType(col)];
	if (col.primaryKey) parts.push("PRIMARY KEY");
	if (col.notNull && !col.primaryKey) parts.push("NOT NULL");
	if (col.default) parts.push(`DEFAULT ${col.default}`);
	if (col.check) parts.push(`CHECK (${col.check})`);
	if (col.references) {
		parts.push(`REFERENCES ${t(col.references.table)}(${col.references.column}) ON DELETE RESTRICT`);
	}
	return `  ${parts.join(" ")}`;
}

/**
 * PostgreSQL DDL for every payrail table and index. Idempotent.
 *
 * @example
 * ```ts
 * await adapter.raw(generateSchemaSql("banking"), []);
 * ```
 */
export function generateSchemaSql(schema = "public"): string {
	const t = createTableResolver(schema);
	const statements: string[] = [];

	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS "${schema}";`);
	}

	for (const [tableName, def] of Object.entries(TABLES)) {
		const columns = Object.entries(def.columns).map(([name, col]) => columnSql(name, col, t));
		statements.push(`CREATE TABLE IF NOT EXISTS ${t(tableName)} (\n${columns.join(",\n")}\n);`);

		for (const idx of def.indexes ?? []) {
			const kind = idx.unique ? "UNIQUE INDEX" : "INDEX";
			statements.push(
				`CREATE ${kind} IF NOT EXISTS ${idx.name} ON ${t(tableName)} (${idx.columns.join(", ")});`,
			);
		}
	}

	return `${statements.join("\n")}\n`;
}
