// =============================================================================
// MEMORY ADAPTER — InstaloAdapter backed by in-memory Maps
// =============================================================================
// For tests and local development. Records live in model -> id -> record maps.
// Inside a transaction, writes go to a private write set layered over the
// store; they reach the store only on commit, so readers outside the
// transaction never see them. `findOne({ forUpdate: true })` takes a per-row
// lock held until commit or rollback. Reads do not take locks, so callers that
// read-then-write must lock first (the engine always does).

import type {
	InstaloAdapter,
	InstaloTransactionAdapter,
	Row,
	SortBy,
	Where,
} from "@instalo/core/db";
import { generateId } from "@instalo/core/utils";
import { type Release, RowLocks } from "./row-locks.js";

type ModelStore = Map<string, Row>;
type Store = Map<string, ModelStore>;

/** Pending writes of one transaction; null marks a deleted record */
type WriteSet = Map<string, Map<string, Row | null>>;

interface TxState {
	held: Map<string, Release>;
	writes: WriteSet;
}

export interface MemoryAdapterOptions {
	/** How long a transaction waits for a row lock. Default: 5000 */
	lockTimeoutMs?: number;
}

export interface MemoryAdapter extends InstaloAdapter {
	/** Drop every record. */
	reset(): void;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function getModelStore(store: Store, model: string): ModelStore {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

function toComparable(value: unknown): unknown {
	return value instanceof Date ? value.getTime() : value;
}

function compare(a: unknown, b: unknown): number | null {
	const left = toComparable(a);
	const right = toComparable(b);
	if (typeof left === "number" && typeof right === "number") return left - right;
	if (typeof left === "string" && typeof right === "string") {
		return left < right ? -1 : left > right ? 1 : 0;
	}
	return null;
}

function matchesCondition(record: Row, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return toComparable(value) === toComparable(condition.value);
		case "ne":
			return toComparable(value) !== toComparable(condition.value);
		case "gt": {
			const c = compare(value, condition.value);
			return c !== null && c > 0;
		}
		case "gte": {
			const c = compare(value, condition.value);
			return c !== null && c >= 0;
		}
		case "lt": {
			const c = compare(value, condition.value);
			return c !== null && c < 0;
		}
		case "lte": {
			const c = compare(value, condition.value);
			return c !== null && c <= 0;
		}
		case "in": {
			if (!Array.isArray(condition.value)) {
				throw new TypeError(`"in" condition on ${condition.field} requires an array value`);
			}
			const target = toComparable(value);
			return condition.value.some((candidate) => toComparable(candidate) === target);
		}
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
	}
}

function matchesAll(record: Row, where: Where[]): boolean {
	return where.every((w) => matchesCondition(record, w));
}

function filterRecords(records: Iterable<Row>, where: Where[]): Row[] {
	const results: Row[] = [];
	for (const record of records) {
		if (matchesAll(record, where)) {
			results.push(record);
		}
	}
	return results;
}

function sortRecords(records: Row[], sortBy: SortBy): Row[] {
	return [...records].sort((a, b) => {
		const aVal = a[sortBy.field];
		const bVal = b[sortBy.field];

		if (aVal === null || aVal === undefined) return bVal === null || bVal === undefined ? 0 : 1;
		if (bVal === null || bVal === undefined) return -1;

		const comparison = compare(aVal, bVal) ?? 0;
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}

function readId(record: Row): string {
	const id = record.id;
	if (typeof id !== "string") {
		throw new Error("Memory adapter records need a string id");
	}
	return id;
}

// =============================================================================
// RECORD VIEW
// =============================================================================

/** The records one caller can see: the store, plus its own pending writes. */
interface RecordView {
	get(model: string, id: string): Row | undefined;
	all(model: string): Row[];
	set(model: string, id: string, record: Row): void;
	remove(model: string, id: string): void;
}

function storeView(store: Store): RecordView {
	return {
		get: (model, id) => getModelStore(store, model).get(id),
		all: (model) => [...getModelStore(store, model).values()],
		set: (model, id, record) => {
			getModelStore(store, model).set(id, record);
		},
		remove: (model, id) => {
			getModelStore(store, model).delete(id);
		},
	};
}

function writeSetView(store: Store, writes: WriteSet): RecordView {
	const pending = (model: string) => {
		let modelWrites = writes.get(model);
		if (!modelWrites) {
			modelWrites = new Map();
			writes.set(model, modelWrites);
		}
		return modelWrites;
	};

	return {
		get: (model, id) => {
			const modelWrites = pending(model);
			if (modelWrites.has(id)) return modelWrites.get(id) ?? undefined;
			return getModelStore(store, model).get(id);
		},
		all: (model) => {
			const modelWrites = pending(model);
			const modelStore = getModelStore(store, model);
			const results: Row[] = [];
			for (const [id, record] of modelStore) {
				if (!modelWrites.has(id)) {
					results.push(record);
					continue;
				}
				const written = modelWrites.get(id);
				if (written) results.push(written);
			}
			for (const [id, written] of modelWrites) {
				if (written && !modelStore.has(id)) results.push(written);
			}
			return results;
		},
		set: (model, id, record) => {
			pending(model).set(id, record);
		},
		remove: (model, id) => {
			pending(model).set(id, null);
		},
	};
}

function commit(store: Store, writes: WriteSet): void {
	for (const [model, modelWrites] of writes) {
		const modelStore = getModelStore(store, model);
		for (const [id, record] of modelWrites) {
			if (record) {
				modelStore.set(id, record);
			} else {
				modelStore.delete(id);
			}
		}
	}
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the adapter methods. With a TxState, writes stay in its write set
 * and `forUpdate` reads lock the row until the transaction ends.
 */
function buildAdapterMethods(
	store: Store,
	locks: RowLocks,
	tx: TxState | null,
): Omit<InstaloTransactionAdapter, "id" | "options"> {
	const view = tx ? writeSetView(store, tx.writes) : storeView(store);

	const lockRow = async (key: string) => {
		if (!tx || tx.held.has(key)) return;
		tx.held.set(key, await locks.acquire(key));
	};

	return {
		create: async <T extends Row>({ model, data }: { model: string; data: T }): Promise<T> => {
			const id = typeof data.id === "string" ? data.id : generateId();
			if (view.get(model, id)) {
				throw new Error(`Duplicate key: ${model} ${id} already exists`);
			}
			view.set(model, id, { ...data, id });
			return { ...data, id };
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
			for (;;) {
				const match = filterRecords(view.all(model), where)[0];
				if (!match) return null;
				if (!forUpdate || !tx) return { ...match } as T;

				const id = readId(match);
				await lockRow(`${model}:${id}`);

				// The row may have changed while this transaction waited for it.
				const current = view.get(model, id);
				if (current && matchesAll(current, where)) {
					return { ...current } as T;
				}
			}
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
			let results = filterRecords(view.all(model), where ?? []);

			if (sortBy) {
				results = sortRecords(results, sortBy);
			}

			const start = offset ?? 0;
			const end = limit !== undefined ? start + limit : undefined;
			return results.slice(start, end).map((r) => ({ ...r }) as T);
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
			const match = filterRecords(view.all(model), where)[0];
			if (!match) return null;

			const id = readId(match);
			const updated: Row = { ...match, ...updateData, id };
			view.set(model, id, updated);
			return { ...updated } as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<void> => {
			for (const record of filterRecords(view.all(model), where)) {
				view.remove(model, readId(record));
			}
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			return filterRecords(view.all(model), where ?? []).length;
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
			let total = 0;
			for (const record of filterRecords(view.all(model), where ?? [])) {
				const value = record[field];
				if (typeof value === "number") total += value;
			}
			return total;
		},

		advisoryLock: async (key: number): Promise<void> => {
			await lockRow(`advisory:${key}`);
		},

		raw: async <T = Row>(_sql: string, _params: unknown[]): Promise<T[]> => {
			throw new Error("raw() is not supported by the memory adapter");
		},

		rawMutate: async (_sql: string, _params: unknown[]): Promise<number> => {
			throw new Error("rawMutate() is not supported by the memory adapter");
		},
	};
}

// =============================================================================
// MEMORY ADAPTER FACTORY
// =============================================================================

/**
 * Create an in-memory adapter.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@instalo/memory-adapter";
 * import { createInstalo } from "@instalo/engine";
 *
 * const instalo = createInstalo({ database: memoryAdapter() });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): MemoryAdapter {
	const store: Store = new Map();
	const locks = new RowLocks(options.lockTimeoutMs ?? 5000);
	const methods = buildAdapterMethods(store, locks, null);

	return {
		id: "memory",
		...methods,

		transaction: async <T>(fn: (tx: InstaloTransactionAdapter) => Promise<T>): Promise<T> => {
			const state: TxState = { held: new Map(), writes: new Map() };
			const txAdapter: InstaloTransactionAdapter = {
				id: "memory",
				...buildAdapterMethods(store, locks, state),
				options: { supportsAdvisoryLocks: true, supportsForUpdate: true, dialectName: "memory" },
			};

			// A failed transaction drops its write set untouched
			try {
				const result = await fn(txAdapter);
				commit(store, state.writes);
				return result;
			} finally {
				for (const release of state.held.values()) {
					release();
				}
			}
		},

		reset: () => {
			store.clear();
		},

		options: {
			supportsAdvisoryLocks: true,
			supportsForUpdate: true,
			dialectName: "memory",
		},
	};
}
