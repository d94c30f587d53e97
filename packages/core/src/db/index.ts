export type {
	PayrailAdapter,
	PayrailAdapterOptions,
	PayrailTransactionAdapter,
	Row,
	SortBy,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildOrderByClause,
	buildWhereClause,
	escapeLike,
	keysToCamel,
	keysToSnake,
	toCamelCase,
	toSnakeCase,
} from "./adapter-utils.js";
export {
	createPooledAdapterResult,
	getPoolStats,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
export { createTableResolver } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
export { classifyStoreError } from "./store-errors.js";
export { queueAfterCommit, runWithTransactionContext } from "./transaction-context.js";
