// =============================================================================
// CONNECTION POOL
// =============================================================================
// Wraps a pg.Pool in a drizzle adapter with shutdown and pool stats.
//
// Usage:
//   import { createPooledAdapter } from "@payrail/drizzle-adapter";
//   const { adapter, close, stats } = createPooledAdapter({ connectionString: "..." });

import {
	createPooledAdapterResult,
	type PooledAdapterResult,
	RECOMMENDED_POOL_CONFIG,
} from "@payrail/core/db";
import { drizzle } from "drizzle-orm/node-postgres";
import pg, { type PoolConfig } from "pg";
import { drizzleAdapter } from "./adapter.js";

export interface DrizzlePooledAdapterConfig {
	connectionString: string;
	/** Overrides merged over RECOMMENDED_POOL_CONFIG */
	pool?: PoolConfig;
}

/**
 * Open a pg pool with the recommended settings and return an adapter over it.
 *
 * @example
 * ```ts
 * const { adapter, close } = createPooledAdapter({ connectionString: process.env.DATABASE_URL ?? "" });
 * const payrail = createPayrail({ database: adapter });
 *
 * // On shutdown:
 * await close();
 * ```
 */
export function createPooledAdapter(config: DrizzlePooledAdapterConfig): PooledAdapterResult {
	const pool = new pg.Pool({
		...RECOMMENDED_POOL_CONFIG,
		...config.pool,
		connectionString: config.connectionString,
	});
	return createPooledAdapterResult(drizzleAdapter(drizzle(pool)), pool);
}
