// =============================================================================
// VERSIONED ROW HELPERS
// =============================================================================
// Every mutable aggregate carries a `version`. Writes are conditional on the
// version read earlier in the same transaction; a miss means someone else got
// there first and surfaces as a transient OPTIMISTIC_LOCK_CONFLICT.

import { InstaloError } from "@instalo/core";
import type { InstaloTransactionAdapter, Row } from "@instalo/core/db";

export async function lockRow<T>(
	tx: InstaloTransactionAdapter,
	model: string,
	id: string,
	map: (row: Row) => T,
	label: string,
): Promise<T> {
	const row = await tx.findOne({
		model,
		where: [{ field: "id", operator: "eq", value: id }],
		forUpdate: true,
	});
	if (!row) throw InstaloError.notFound(`${label} ${id} not found`);
	return map(row);
}

export async function findRow<T>(
	tx: Pick<InstaloTransactionAdapter, "findOne">,
	model: string,
	id: string,
	map: (row: Row) => T,
	label: string,
): Promise<T> {
	const row = await tx.findOne({ model, where: [{ field: "id", operator: "eq", value: id }] });
	if (!row) throw InstaloError.notFound(`${label} ${id} not found`);
	return map(row);
}

export async function updateVersioned<T>(
	tx: InstaloTransactionAdapter,
	params: {
		model: string;
		current: { id: string; version: number };
		changes: Row;
		map: (row: Row) => T;
		/** Set `updatedAt` to this instant; omit for tables without the column */
		now?: Date;
	},
): Promise<T> {
	const { model, current, changes, map, now } = params;
	const row = await tx.update({
		model,
		where: [
			{ field: "id", operator: "eq", value: current.id },
			{ field: "version", operator: "eq", value: current.version },
		],
		update: {
			...changes,
			version: current.version + 1,
			...(now ? { updatedAt: now } : {}),
		},
	});
	if (!row) {
		throw InstaloError.optimisticLockConflict(
			`${model} ${current.id} changed since version ${current.version}`,
		);
	}
	return map(row);
}
