// =============================================================================
// MEMORY ADAPTER — PayrailAdapter backed by in-memory Maps
// =============================================================================
// Used by unit tests and local runs; no database required.
// Data lives in nested Maps: model name -> primary key -> row.
//
// Every operation runs one at a time through a promise-chain mutex, so a
// transaction behaves as if it held a lock on the whole store. Transactions
// snapshot the store up front and restore it when the callback throws.
//
// Given table definitions, the adapter also enforces primary-key uniqueness,
// foreign keys on insert, RESTRICT on delete, and single-column CHECKs on
// insert and update, reporting violations as CONSTRAINT_VIOLATION the way the
// PostgreSQL store does.

import {
	type PayrailAdapter,
	type PayrailAdapterOptions,
	type PayrailTransactionAdapter,
	type Row,
	type SortBy,
	toCamelCase,
	type Where,
} from "@payrail/core/db";
import { PayrailError } from "@payrail/core/error";
import type { TableDefinition } from "@payrail/core";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Store = Map<string, Map<string, Row>>;

interface ForeignKey {
	field: string;
	model: string;
	referencedField: string;
}

/** A `column <op> number` CHECK, the only form the memory store evaluates. */
interface ColumnCheck {
	field: string;
	expression: string;
	holds: (value: number) => boolean;
}

interface ModelMeta {
	primaryKey: string;
	foreignKeys: ForeignKey[];
	checks: ColumnCheck[];
}

export interface MemoryAdapterOptions {
	/** Table definitions used for primary keys and foreign keys. Without them, rows are keyed by `id`. */
	tables?: Record<string, TableDefinition>;
}

const CHECK_EXPRESSION = /^\s*([a-z_][a-z0-9_]*)\s*(>=|<=|<>|>|<|=)\s*(-?\d+(?:\.\d+)?)\s*$/i;

const COMPARATORS: Record<string, (value: number, bound: number) => boolean> = {
	">=": (value, bound) => value >= bound,
	"<=": (value, bound) => value <= bound,
	">": (value, bound) => value > bound,
	"<": (value, bound) => value < bound,
	"=": (value, bound) => value === bound,
	"<>": (value, bound) => value !== bound,
};

function parseCheck(model: string, expression: string): ColumnCheck {
	const match = CHECK_EXPRESSION.exec(expression);
	const compare = match ? COMPARATORS[match[2] ?? ""] : undefined;
	if (!match || !compare) {
		throw new Error(`Unsupported CHECK on ${model} for the memory adapter: ${expression}`);
	}
	const bound = Number(match[3]);
	return {
		field: toCamelCase(match[1] ?? ""),
		expression,
		holds: (value) => compare(value, bound),
	};
}

function buildModelMeta(tables: Record<string, TableDefinition>): Map<string, ModelMeta> {
	const meta = new Map<string, ModelMeta>();
	for (const [model, def] of Object.entries(tables)) {
		let primaryKey = "id";
		const foreignKeys: ForeignKey[] = [];
		const checks: ColumnCheck[] = [];
		for (const [column, col] of Object.entries(def.columns)) {
			if (col.primaryKey) primaryKey = toCamelCase(column);
			if (col.check) checks.push(parseCheck(model, col.check));
			if (col.references) {
				foreignKeys.push({
					field: toCamelCase(column),
					model: col.references.table,
					referencedField: toCamelCase(col.references.column),
				});
			}
		}
		meta.set(model, { primaryKey, foreignKeys, checks });
	}
	return meta;
}

function cloneStore(store: Store): Store {
	const clone: Store = new Map();
	for (const [model, records] of store) {
		const recordClone = new Map<string, Row>();
		for (const [id, record] of records) {
			recordClone.set(id, { ...record });
		}
		clone.set(model, recordClone);
	}
	return clone;
}

function getModelStore(store: Store, model: string): Map<string, Row> {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

function toComparable(value: unknown): number | string | undefined {
	if (typeof value === "number" || typeof value === "string") return value;
	if (typeof value === "bigint") return Number(value);
	if (value instanceof Date) return value.getTime();
	return undefined;
}

/** Three-way comparison; null when the values are not mutually comparable. */
function compareValues(a: unknown, b: unknown): number | null {
	const x = toComparable(a);
	const y = toComparable(b);
	if (x === undefined || y === undefined || typeof x !== typeof y) return null;
	if (x === y) return 0;
	return x < y ? -1 : 1;
}

function valuesEqual(a: unknown, b: unknown): boolean {
	const cmp = compareValues(a, b);
	return cmp === null ? a === b : cmp === 0;
}

/** Translate a SQL LIKE pattern (with backslash escapes) into a RegExp. */
function likeToRegExp(pattern: string, caseInsensitive: boolean): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern.charAt(i);
		if (ch === "\\" && i + 1 < pattern.length) {
			i++;
			source += pattern.charAt(i).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
		} else if (ch === "%") {
			source += ".*";
		} else if (ch === "_") {
			source += ".";
		} else {
			source += ch.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
		}
	}
	return new RegExp(`^${source}$`, caseInsensitive ? "is" : "s");
}

function matchesCondition(record: Row, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return valuesEqual(value, condition.value);
		case "ne":
			return value !== null && value !== undefined && !valuesEqual(value, condition.value);
		case "gt":
			return (compareValues(value, condition.value) ?? 0) > 0;
		case "gte": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp >= 0;
		}
		case "lt":
			return (compareValues(value, condition.value) ?? 0) < 0;
		case "lte": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp <= 0;
		}
		case "in":
			return (
				Array.isArray(condition.value) && condition.value.some((v) => valuesEqual(value, v))
			);
		case "like":
		case "ilike":
			if (typeof value !== "string" || typeof condition.value !== "string") return false;
			return likeToRegExp(condition.value, condition.operator === "ilike").test(value);
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
		default:
			return false;
	}
}

/** All conditions must match (AND). Insertion order is preserved. */
function filterRecords(records: Map<string, Row>, where: Where[]): Row[] {
	const results: Row[] = [];
	for (const record of records.values()) {
		if (where.every((w) => matchesCondition(record, w))) {
			results.push(record);
		}
	}
	return results;
}

/** Stable multi-key sort; NULLs last in either direction. */
function sortRecords(records: Row[], sortBy: SortBy[]): Row[] {
	return [...records].sort((a, b) => {
		for (const key of sortBy) {
			const aVal = a[key.field];
			const bVal = b[key.field];
			const aNull = aVal === null || aVal === undefined;
			const bNull = bVal === null || bVal === undefined;
			if (aNull && bNull) continue;
			if (aNull) return 1;
			if (bNull) return -1;

			const cmp = compareValues(aVal, bVal) ?? 0;
			if (cmp !== 0) return key.direction === "desc" ? -cmp : cmp;
		}
		return 0;
	});
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the adapter methods over a store accessor. The accessor is read on
 * every call because a rollback swaps the store object.
 */
function buildAdapterMethods(
	getStore: () => Store,
	meta: Map<string, ModelMeta>,
): Omit<PayrailTransactionAdapter, "id" | "options"> {
	const primaryKeyOf = (model: string) => meta.get(model)?.primaryKey ?? "id";

	function assertForeignKeys(model: string, record: Row): void {
		for (const fk of meta.get(model)?.foreignKeys ?? []) {
			const value = record[fk.field];
			if (value === null || value === undefined) continue;
			const target = getStore().get(fk.model);
			const exists =
				target !== undefined &&
				filterRecords(target, [{ field: fk.referencedField, operator: "eq", value }]).length > 0;
			if (!exists) {
				throw PayrailError.constraintViolation(
					`Insert into ${model} violates foreign key ${fk.field} -> ${fk.model}`,
					{ constraint: "foreign_key", model, field: fk.field },
				);
			}
		}
	}

	// A CHECK passes on NULL, as in SQL
	function assertChecks(model: string, record: Row): void {
		for (const check of meta.get(model)?.checks ?? []) {
			const value = record[check.field];
			if (value === null || value === undefined) continue;
			const numeric = typeof value === "number" || typeof value === "bigint" ? Number(value) : Number.NaN;
			if (!check.holds(numeric)) {
				throw PayrailError.constraintViolation(`Row in ${model} violates CHECK (${check.expression})`, {
					constraint: "check",
					model,
					field: check.field,
				});
			}
		}
	}

	function assertNotReferenced(model: string, record: Row): void {
		for (const [otherModel, otherMeta] of meta) {
			for (const fk of otherMeta.foreignKeys) {
				if (fk.model !== model) continue;
				const rows = getStore().get(otherModel);
				const value = record[fk.referencedField];
				if (rows && filterRecords(rows, [{ field: fk.field, operator: "eq", value }]).length > 0) {
					throw PayrailError.constraintViolation(
						`Delete from ${model} is restricted by ${otherModel}.${fk.field}`,
						{ constraint: "foreign_key", model: otherModel, field: fk.field },
					);
				}
			}
		}
	}

	return {
		create: async ({ model, data }: { model: string; data: Row }): Promise<number> => {
			const modelStore = getModelStore(getStore(), model);
			const pk = primaryKeyOf(model);
			const key = data[pk];

			if (typeof key !== "string" && typeof key !== "number") {
				throw new Error(`Insert into ${model} is missing primary key ${pk}`);
			}
			if (modelStore.has(String(key))) {
				throw PayrailError.constraintViolation(`Duplicate ${pk} in ${model}: ${key}`, {
					constraint: "unique",
					model,
					field: pk,
				});
			}
			assertForeignKeys(model, data);
			assertChecks(model, data);

			modelStore.set(String(key), { ...data });
			return 1;
		},

		findOne: async ({
			model,
			where,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<Row | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			return first ? { ...first } : null;
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
			const modelStore = getStore().get(model);
			if (!modelStore) return [];

			let results = filterRecords(modelStore, where ?? []);

			if (sortBy && sortBy.length > 0) {
				results = sortRecords(results, sortBy);
			}
			if (offset !== undefined) {
				results = results.slice(offset);
			}
			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => ({ ...r }));
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
			if (Object.keys(update ?? {}).length === 0 && Object.keys(increment ?? {}).length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			const pk = primaryKeyOf(model);
			const updates = filterRecords(modelStore, where).map((match) => {
				const updated: Row = { ...match, ...update };
				for (const [field, delta] of Object.entries(increment ?? {})) {
					const current = match[field];
					if (typeof current !== "number") {
						throw new Error(`Cannot increment non-numeric ${model}.${field}`);
					}
					updated[field] = current + delta;
				}
				assertChecks(model, updated);
				return { key: String(match[pk]), updated };
			});
			// All rows pass their checks before any is written
			for (const { key, updated } of updates) {
				modelStore.set(key, updated);
			}
			return updates.length;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			const pk = primaryKeyOf(model);
			const matches = filterRecords(modelStore, where);
			for (const match of matches) {
				assertNotReferenced(model, match);
			}
			for (const match of matches) {
				modelStore.delete(String(match[pk]));
			}
			return matches.length;
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;
			return filterRecords(modelStore, where ?? []).length;
		},

		raw: async (_sql: string, _params: unknown[]): Promise<Row[]> => {
			throw new Error("Raw SQL is not supported by the memory adapter");
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

const MEMORY_OPTIONS: PayrailAdapterOptions = {
	dialectName: "memory",
	supportsForUpdate: false,
};

/**
 * Create a PayrailAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@payrail/memory-adapter";
 * import { getPayrailTables } from "payrail";
 *
 * const adapter = memoryAdapter({ tables: getPayrailTables() });
 * await adapter.create({ model: "beneficiaries", data: { beneficiaryId: "b1", name: "Ada" } });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): PayrailAdapter {
	let store: Store = new Map();
	const meta = buildModelMeta(options.tables ?? {});
	const getStore = () => store;
	const methods = buildAdapterMethods(getStore, meta);

	let queue: Promise<void> = Promise.resolve();
	function exclusive<T>(fn: () => Promise<T>): Promise<T> {
		const run = queue.then(fn);
		queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	return {
		id: "memory",
		create: (args) => exclusive(() => methods.create(args)),
		findOne: (args) => exclusive(() => methods.findOne(args)),
		findMany: (args) => exclusive(() => methods.findMany(args)),
		update: (args) => exclusive(() => methods.update(args)),
		delete: (args) => exclusive(() => methods.delete(args)),
		count: (args) => exclusive(() => methods.count(args)),
		raw: (sql, params) => methods.raw(sql, params),

		transaction: <T>(fn: (tx: PayrailTransactionAdapter) => Promise<T>): Promise<T> =>
			exclusive(async () => {
				const snapshot = cloneStore(store);
				try {
					return await fn({ id: "memory", ...methods, options: MEMORY_OPTIONS });
				} catch (error) {
					store = snapshot;
					throw error;
				}
			}),

		options: { ...MEMORY_OPTIONS },
	};
}
