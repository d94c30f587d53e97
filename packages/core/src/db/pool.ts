// =============================================================================
// POOL TYPES & CONSTANTS — Shared by pooled SQL adapters
// =============================================================================

import type { PayrailAdapter } from "./adapter.js";

/**
 * The part of the `pg.Pool` surface payrail reads, without importing `pg`.
 */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients currently checked out */
	activeCount: number;
	/** Callers waiting for a client */
	waitingCount: number;
}

export interface PooledAdapterResult {
	adapter: PayrailAdapter;
	/** Drain and close the pool. The process entrypoint calls this on shutdown. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * Suggested `pg.Pool` settings. Spread into the constructor and override as needed.
 *
 * @example
 * ```ts
 * const pool = new Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: process.env.DATABASE_URL });
 * ```
 */
export const RECOMMENDED_POOL_CONFIG = {
	/** For several instances, divide by the instance count. */
	max: 20,
	/** Idle clients kept warm. */
	min: 5,
	idleTimeoutMillis: 30_000,
	/** Fail fast when no client is free within 10s. */
	connectionTimeoutMillis: 10_000,
	/** Recycle clients after 30min. */
	maxLifetimeSeconds: 1_800,
	statement_timeout: 30_000,
} as const;

export function getPoolStats(pool: PoolLike): PoolStats {
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount: pool.totalCount - pool.idleCount,
		waitingCount: pool.waitingCount,
	};
}

export function createPooledAdapterResult(
	adapter: PayrailAdapter,
	pool: PoolLike,
): PooledAdapterResult {
	return {
		adapter,
		close: () => pool.end(),
		stats: () => getPoolStats(pool),
	};
}
