// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase ↔ snake_case conversion and WHERE/ORDER BY building for SQL stores.

import type { Row, SortBy, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: Row): Row {
	const result: Row = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Row): Row {
	const result: Row = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

/**
 * Escape LIKE wildcards so user input matches literally.
 * Backslash is PostgreSQL's default LIKE escape character.
 */
export function escapeLike(value: string): string {
	return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function listValue(value: unknown): unknown[] {
	return Array.isArray(value) ? value : [value];
}

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause (without the WHERE keyword) and its parameter values,
 * numbered `$startIndex`, `$startIndex + 1`, ...
 */
export function buildWhereClause(
	where: Where[],
	startIndex = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	const compare = (col: string, op: string, value: unknown) => {
		conditions.push(`"${col}" ${op} $${paramIdx}`);
		params.push(value);
		paramIdx++;
	};

	for (const w of where) {
		const col = toSnakeCase(w.field);

		switch (w.operator) {
			case "eq":
				compare(col, "=", w.value);
				break;
			case "ne":
				compare(col, "!=", w.value);
				break;
			case "gt":
				compare(col, ">", w.value);
				break;
			case "gte":
				compare(col, ">=", w.value);
				break;
			case "lt":
				compare(col, "<", w.value);
				break;
			case "lte":
				compare(col, "<=", w.value);
				break;
			case "like":
				compare(col, "LIKE", w.value);
				break;
			case "ilike":
				compare(col, "ILIKE", w.value);
				break;
			case "in": {
				const values = listValue(w.value);
				if (values.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = values.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`"${col}" IN (${placeholders})`);
				params.push(...values);
				paramIdx += values.length;
				break;
			}
			case "is_null":
				conditions.push(`"${col}" IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`"${col}" IS NOT NULL`);
				break;
		}
	}

	return { clause: conditions.join(" AND "), params };
}

/** Build an ORDER BY clause (without the keywords). NULLs always sort last. */
export function buildOrderByClause(sortBy: SortBy[]): string {
	return sortBy
		.map((s) => `"${toSnakeCase(s.field)}" ${s.direction === "desc" ? "DESC" : "ASC"} NULLS LAST`)
		.join(", ");
}
