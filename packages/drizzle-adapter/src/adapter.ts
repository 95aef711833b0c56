// =============================================================================
// DRIZZLE ADAPTER — InstaloAdapter backed by Drizzle ORM on PostgreSQL
// =============================================================================
// All statements are plain SQL built by the shared core builder and executed
// through drizzle's `sql` template, which keeps FOR UPDATE, RETURNING and
// advisory locks under our control while values stay parameterized.

import {
	buildSqlAdapterMethods,
	type InstaloAdapter,
	type InstaloAdapterOptions,
	type InstaloTransactionAdapter,
	type Row,
	type SqlExecutor,
} from "@instalo/core/db";
import { type SQL, sql } from "drizzle-orm";

/** The slice of a drizzle database (or transaction) this adapter drives. */
export interface DrizzleExecutor {
	execute(query: SQL): Promise<unknown>;
}

export interface DrizzleDatabase extends DrizzleExecutor {
	transaction<T>(fn: (tx: DrizzleExecutor) => Promise<T>): Promise<T>;
}

export interface DrizzleAdapterOptions {
	/** PostgreSQL schema; overridden by the engine's `schema` option. Default: "instalo" */
	schema?: string;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function isRow(value: unknown): value is Row {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** node-postgres returns `{ rows, rowCount }`; some drivers return the rows directly. */
function extractRows(result: unknown): Row[] {
	if (Array.isArray(result)) return result.filter(isRow);
	if (isRow(result) && Array.isArray(result.rows)) return result.rows.filter(isRow);
	return [];
}

function extractRowCount(result: unknown): number {
	if (isRow(result) && typeof result.rowCount === "number") return result.rowCount;
	if (Array.isArray(result)) return result.length;
	return 0;
}

/**
 * Turn a `$1, $2` placeholder query into a drizzle SQL object, binding each
 * placeholder to its parameter.
 */
export function toDrizzleSql(query: string, params: unknown[]): SQL {
	const chunks: SQL[] = [];
	let lastIdx = 0;

	for (const match of query.matchAll(/\$(\d+)/g)) {
		const index = match.index ?? 0;
		if (index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, index)));
		}
		const paramIndex = Number(match[1]) - 1;
		if (paramIndex < 0 || paramIndex >= params.length) {
			throw new RangeError(`Placeholder ${match[0]} has no bound parameter`);
		}
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = index + match[0].length;
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return sql.join(chunks);
}

function createExecutor(db: DrizzleExecutor): SqlExecutor {
	return {
		query: async (query, params) => extractRows(await db.execute(toDrizzleSql(query, params))),
		mutate: async (query, params) =>
			extractRowCount(await db.execute(toDrizzleSql(query, params))),
		advisoryLock: async (key) => {
			await db.execute(sql`SELECT pg_advisory_xact_lock(${key})`);
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create an InstaloAdapter backed by a Drizzle database.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@instalo/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool));
 * ```
 */
export function drizzleAdapter(
	db: DrizzleDatabase,
	adapterOptions: DrizzleAdapterOptions = {},
): InstaloAdapter {
	const options: InstaloAdapterOptions = {
		supportsAdvisoryLocks: true,
		supportsForUpdate: true,
		dialectName: "postgres",
		schema: adapterOptions.schema ?? "instalo",
	};
	const getSchema = () => options.schema ?? "instalo";

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(createExecutor(db), getSchema),

		transaction: async <T>(fn: (tx: InstaloTransactionAdapter) => Promise<T>): Promise<T> => {
			return db.transaction(async (tx) => {
				const txAdapter: InstaloTransactionAdapter = {
					id: "drizzle",
					...buildSqlAdapterMethods(createExecutor(tx), getSchema),
					options,
				};
				return fn(txAdapter);
			});
		},

		options,
	};
}
