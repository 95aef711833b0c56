// =============================================================================
// INSTALO ADAPTER INTERFACE
// =============================================================================
// Persistence boundary for the ledger engine. Managers only use the CRUD
// methods plus `transaction`, so any store that can lock a row for the
// duration of a transaction (PostgreSQL, the in-memory adapter) can back it.
// `raw`/`rawMutate` are reserved for SQL-speaking adapters (CLI reports).

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

/** Rows cross the adapter boundary as plain camelCase records. */
export type Row = Record<string, unknown>;

export interface InstaloAdapter {
	id: string;

	create<T extends Row>(data: { model: string; data: T }): Promise<T>;

	/** With `forUpdate`, the row stays locked until the enclosing transaction ends. */
	findOne<T = Row>(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T = Row>(data: {
		model: string;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy;
	}): Promise<T[]>;

	/** Updates at most one row. Returns null when nothing matched. */
	update<T = Row>(data: { model: string; where: Where[]; update: Row }): Promise<T | null>;

	delete(data: { model: string; where: Where[] }): Promise<void>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	/** SUM over an integer column. Returns 0 when no rows match. */
	sum(data: { model: string; field: string; where?: Where[] }): Promise<number>;

	transaction<T>(fn: (tx: InstaloTransactionAdapter) => Promise<T>): Promise<T>;

	/** Transaction-scoped advisory lock. */
	advisoryLock(key: number): Promise<void>;

	raw<T = Row>(sql: string, params: unknown[]): Promise<T[]>;

	rawMutate(sql: string, params: unknown[]): Promise<number>;

	options?: InstaloAdapterOptions;
}

export type InstaloTransactionAdapter = Omit<InstaloAdapter, "transaction">;

export interface InstaloAdapterOptions {
	supportsAdvisoryLocks: boolean;
	supportsForUpdate: boolean;
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table name qualification. Set by the engine context. */
	schema?: string;
}
