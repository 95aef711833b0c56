// =============================================================================
// CONNECTION POOL
// =============================================================================
// Creates a pg Pool, wraps it in drizzle and the adapter, and hands back
// shutdown and monitoring hooks.

import type { InstaloAdapter } from "@instalo/core/db";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { type DrizzleAdapterOptions, drizzleAdapter } from "./adapter.js";

export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	statement_timeout: 30_000,
} as const;

export interface PooledAdapterConfig extends DrizzleAdapterOptions {
	connectionString: string;
	/** Overrides for the pg pool; merged over RECOMMENDED_POOL_CONFIG */
	pool?: pg.PoolConfig;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	activeCount: number;
	waitingCount: number;
}

export interface PooledAdapterResult {
	adapter: InstaloAdapter;
	/** Wait for active queries, then close every connection. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * @example
 * ```ts
 * const { adapter, close } = createPooledDrizzleAdapter({
 *   connectionString: process.env.DATABASE_URL ?? "",
 * });
 * ```
 */
export function createPooledDrizzleAdapter(config: PooledAdapterConfig): PooledAdapterResult {
	const pool = new pg.Pool({
		...RECOMMENDED_POOL_CONFIG,
		...config.pool,
		connectionString: config.connectionString,
	});

	return {
		adapter: drizzleAdapter(drizzle(pool), { schema: config.schema }),
		close: () => pool.end(),
		stats: () => ({
			totalCount: pool.totalCount,
			idleCount: pool.idleCount,
			activeCount: pool.totalCount - pool.idleCount,
			waitingCount: pool.waitingCount,
		}),
	};
}
