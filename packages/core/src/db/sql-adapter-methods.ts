// =============================================================================
// SQL ADAPTER METHODS — Shared CRUD logic for SQL-based stores
// =============================================================================
// Every SQL store builds the same statements; only execution differs. A store
// supplies a two-method SqlExecutor and gets the full adapter surface back.

import type { PayrailTransactionAdapter, Row, SortBy, Where } from "./adapter.js";
import {
	buildOrderByClause,
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toSnakeCase,
} from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

// =============================================================================
// SQL EXECUTOR INTERFACE
// =============================================================================

export interface SqlExecutor {
	/** Execute a statement that returns rows. */
	query(sql: string, params: unknown[]): Promise<Row[]>;
	/** Execute an INSERT/UPDATE/DELETE and return the affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
}

// =============================================================================
// SHARED CRUD BUILDER
// =============================================================================

/**
 * Build the standard adapter methods from a SqlExecutor.
 * `getSchema` is read on every call so the context can set it after creation.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<PayrailTransactionAdapter, "id" | "options"> {
	return {
		create: async ({ model, data }: { model: string; data: Row }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders})`;

			return executor.mutate(query, values);
		},

		findOne: async ({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<Row | null> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			return row ? keysToCamel(row) : null;
		},

		findMany: async ({
			model,
			where,
			sortBy,
			limit,
			offset,
		}: {
			model: string;
			where?: Where[];
			sortBy?: SortBy[];
			limit?: number;
			offset?: number;
		}): Promise<Row[]> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}`;
			let paramIdx = params.length + 1;

			if (sortBy && sortBy.length > 0) {
				query += ` ORDER BY ${buildOrderByClause(sortBy)}`;
			}

			if (limit !== undefined) {
				query += ` LIMIT $${paramIdx}`;
				params.push(limit);
				paramIdx++;
			}

			if (offset !== undefined) {
				query += ` OFFSET $${paramIdx}`;
				params.push(offset);
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => keysToCamel(r));
		},

		update: async ({
			model,
			where,
			update,
			increment,
		}: {
			model: string;
			where: Where[];
			update?: Row;
			increment?: Record<string, number>;
		}): Promise<number> => {
			const assignments: string[] = [];
			const setValues: unknown[] = [];

			for (const [col, value] of Object.entries(keysToSnake(update ?? {}))) {
				setValues.push(value);
				assignments.push(`"${col}" = $${setValues.length}`);
			}
			for (const [field, delta] of Object.entries(increment ?? {})) {
				const col = toSnakeCase(field);
				setValues.push(delta);
				assignments.push(`"${col}" = "${col}" + $${setValues.length}`);
			}

			if (assignments.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setValues.length + 1,
			);

			const t = createTableResolver(getSchema());
			const query = `UPDATE ${t(model)} SET ${assignments.join(", ")} WHERE ${whereClause}`;

			return executor.mutate(query, [...setValues, ...whereParams]);
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			return executor.mutate(`DELETE FROM ${t(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`;

			const rows = await executor.query(query, params);
			return Number(rows[0]?.count ?? 0);
		},

		raw: (sqlStr: string, params: unknown[]): Promise<Row[]> => executor.query(sqlStr, params),
	};
}
