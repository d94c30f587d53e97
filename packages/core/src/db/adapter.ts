// =============================================================================
// PAYRAIL ADAPTER INTERFACE — the Ledger Store contract
// =============================================================================
// Capability set implemented by every store (PostgreSQL through drizzle, and
// the in-memory store used by tests). Field names are camelCase; SQL stores
// map them to snake_case columns. Every write reports the number of rows it
// affected so callers can treat a no-op as a failure.

export type Row = Record<string, unknown>;

export interface Where {
	field: string;
	operator: WhereOperator;
	value?: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "like"
	| "ilike"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

export interface PayrailAdapter {
	id: string;

	/** Insert one row. Returns the number of rows inserted. */
	create(data: { model: string; data: Row }): Promise<number>;

	findOne(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<Row | null>;

	/** Sort keys apply in order; NULLs sort last in either direction. */
	findMany(data: {
		model: string;
		where?: Where[];
		sortBy?: SortBy[];
		limit?: number;
		offset?: number;
	}): Promise<Row[]>;

	/**
	 * Update every row matching `where`. `update` assigns values, `increment`
	 * adds a signed delta to numeric columns in the same statement.
	 * Returns the number of rows affected.
	 */
	update(data: {
		model: string;
		where: Where[];
		update?: Row;
		increment?: Record<string, number>;
	}): Promise<number>;

	/** Returns the number of rows deleted. */
	delete(data: { model: string; where: Where[] }): Promise<number>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	/** Run `fn` atomically. Resolving commits; throwing rolls every write back. */
	transaction<T>(fn: (tx: PayrailTransactionAdapter) => Promise<T>): Promise<T>;

	/** Execute a raw statement. Only SQL stores support this. */
	raw(sql: string, params: unknown[]): Promise<Row[]>;

	options: PayrailAdapterOptions;
}

export type PayrailTransactionAdapter = Omit<PayrailAdapter, "transaction">;

export interface PayrailAdapterOptions {
	dialectName: "postgres" | "memory";
	supportsForUpdate: boolean;
	/** PostgreSQL schema for table name qualification. Set by the payrail context. */
	schema?: string;
}
