// =============================================================================
// SQL ADAPTER METHODS — Shared CRUD logic for SQL-based adapters
// =============================================================================
// SQL adapters differ only in how a statement is executed. Each one supplies
// a SqlExecutor and gets the full CRUD surface from this builder.

import type { InstaloTransactionAdapter, Row, SortBy, Where } from "./adapter.js";
import { buildWhereClause, keysToCamel, keysToSnake, quoteColumn } from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

export interface SqlExecutor {
	/** Execute a statement that returns rows. */
	query(sql: string, params: unknown[]): Promise<Row[]>;
	/** Execute an INSERT/UPDATE/DELETE and return the affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
	/** Acquire a transaction-scoped advisory lock. */
	advisoryLock(key: number): Promise<void>;
}

/**
 * Build the standard adapter methods from a SqlExecutor.
 * Returns everything an InstaloTransactionAdapter needs except `id` and `options`.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<InstaloTransactionAdapter, "id" | "options"> {
	return {
		create: async <T extends Row>({ model, data }: { model: string; data: T }): Promise<T> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => quoteColumn(c)).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`;

			const rows = await executor.query(query, values);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return keysToCamel(row) as T;
		},

		findOne: async <T = Row>({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		findMany: async <T = Row>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy;
		}): Promise<T[]> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}`;

			if (sortBy) {
				const dir = sortBy.direction === "desc" ? "DESC" : "ASC";
				query += ` ORDER BY ${quoteColumn(sortBy.field)} ${dir}`;
			}

			if (limit !== undefined) {
				params.push(limit);
				query += ` LIMIT $${params.length}`;
			}

			if (offset !== undefined) {
				params.push(offset);
				query += ` OFFSET $${params.length}`;
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => keysToCamel(r) as T);
		},

		update: async <T = Row>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Row;
		}): Promise<T | null> => {
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			const setValues = Object.values(snakeData);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `${quoteColumn(c)} = $${i + 1}`).join(", ");
			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setCols.length + 1,
			);

			// Postgres UPDATE has no LIMIT; every caller filters on the primary key.
			const t = createTableResolver(getSchema());
			const query = `UPDATE ${t(model)} SET ${setClause} WHERE ${whereClause} RETURNING *`;

			const rows = await executor.query(query, [...setValues, ...whereParams]);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<void> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			await executor.mutate(`DELETE FROM ${t(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`;

			const rows = await executor.query(query, params);
			return Number(rows[0]?.count ?? 0);
		},

		sum: async ({
			model,
			field,
			where,
		}: {
			model: string;
			field: string;
			where?: Where[];
		}): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COALESCE(SUM(${quoteColumn(field)}), 0)::bigint AS total FROM ${t(model)} WHERE ${clause}`;

			// pg returns bigint as a string
			const rows = await executor.query(query, params);
			return Number(rows[0]?.total ?? 0);
		},

		advisoryLock: executor.advisoryLock.bind(executor),

		raw: async <T = Row>(sqlStr: string, params: unknown[]): Promise<T[]> => {
			return (await executor.query(sqlStr, params)) as T[];
		},

		rawMutate: async (sqlStr: string, params: unknown[]): Promise<number> => {
			return executor.mutate(sqlStr, params);
		},
	};
}
