// =============================================================================
// DRIZZLE ADAPTER — PayrailAdapter backed by Drizzle ORM
// =============================================================================
// Statements are built once in @payrail/core (buildSqlAdapterMethods) and run
// through drizzle's `sql` template. Raw SQL keeps row locking, conditional
// updates and affected-row counts under our control.

import {
	buildSqlAdapterMethods,
	classifyStoreError,
	type PayrailAdapter,
	type PayrailAdapterOptions,
	type PayrailTransactionAdapter,
	type Row,
	type SqlExecutor,
} from "@payrail/core/db";
import { type SQL, sql } from "drizzle-orm";

// =============================================================================
// TYPES
// =============================================================================

/** The part of a drizzle database or transaction handle the adapter calls. */
export interface DrizzleHandle {
	execute(query: SQL): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

/** A drizzle database, e.g. `drizzle(pool)` from `drizzle-orm/node-postgres`. */
export interface DrizzleDatabase extends DrizzleHandle {
	transaction<T>(fn: (tx: DrizzleHandle) => Promise<T>): Promise<T>;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Turn a `$1, $2` numbered statement and its params into a drizzle SQL object.
 */
export function buildDrizzleSql(query: string, params: unknown[]): SQL {
	const chunks: SQL[] = [];
	const regex = /\$(\d+)/g;
	let lastIdx = 0;
	let match: RegExpExecArray | null = regex.exec(query);

	while (match !== null) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number(match[1]) - 1;
		if (paramIndex < 0 || paramIndex >= params.length) {
			throw new Error(`Statement references $${paramIndex + 1} but only ${params.length} params were given`);
		}
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
		match = regex.exec(query);
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return chunks.length === 0 ? sql.raw(query) : sql.join(chunks);
}

function createExecutor(handle: DrizzleHandle): SqlExecutor {
	return {
		query: async (query: string, params: unknown[]): Promise<Row[]> => {
			try {
				const result = await handle.execute(buildDrizzleSql(query, params));
				return result.rows;
			} catch (error) {
				throw classifyStoreError(error);
			}
		},
		mutate: async (query: string, params: unknown[]): Promise<number> => {
			try {
				const result = await handle.execute(buildDrizzleSql(query, params));
				return result.rowCount ?? 0;
			} catch (error) {
				throw classifyStoreError(error);
			}
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a PayrailAdapter backed by a Drizzle ORM PostgreSQL database.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@payrail/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool));
 * ```
 */
export function drizzleAdapter(db: DrizzleDatabase): PayrailAdapter {
	const options: PayrailAdapterOptions = {
		dialectName: "postgres",
		supportsForUpdate: true,
	};
	const getSchema = () => options.schema ?? "public";

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(createExecutor(db), getSchema),

		transaction: async <T>(fn: (tx: PayrailTransactionAdapter) => Promise<T>): Promise<T> => {
			try {
				return await db.transaction((tx) =>
					fn({
						id: "drizzle",
						...buildSqlAdapterMethods(createExecutor(tx), getSchema),
						options,
					}),
				);
			} catch (error) {
				throw classifyStoreError(error);
			}
		},

		options,
	};
}
