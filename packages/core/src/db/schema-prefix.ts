// =============================================================================
// SCHEMA PREFIX — Qualifies table names with the configured PostgreSQL schema
// =============================================================================

/**
 * Returns a resolver producing quoted, schema-qualified table identifiers.
 *
 * - `"public"` → `"payments"`
 * - `"banking"` → `"banking"."payments"`
 *
 * @example
 * ```ts
 * const t = createTableResolver("banking");
 * `SELECT * FROM ${t("accounts")} WHERE "account_id" = $1`;
 * ```
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName) => `"${tableName}"`;
	}
	return (tableName) => `"${schema}"."${tableName}"`;
}
