export {
	type DrizzleAdapterOptions,
	type DrizzleDatabase,
	type DrizzleExecutor,
	drizzleAdapter,
	toDrizzleSql,
} from "./adapter.js";
export {
	createPooledDrizzleAdapter,
	type PooledAdapterConfig,
	type PooledAdapterResult,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
