export { buildDrizzleSql, type DrizzleDatabase, type DrizzleHandle, drizzleAdapter } from "./adapter.js";
export { createPooledAdapter, type DrizzlePooledAdapterConfig } from "./pool.js";
export * from "./schema.js";
export {
	type PooledAdapterResult,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "@payrail/core/db";
