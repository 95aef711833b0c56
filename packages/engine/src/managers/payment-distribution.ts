// =============================================================================
// PAYMENT DISTRIBUTION
// =============================================================================
// Applies a payment to schedule rows oldest-first. A row takes
// min(amount left, row remaining); partial rows keep their status and only
// become `paid` once fully covered. Money left over flows to later rows.

import type { Installment } from "@instalo/core";
import { InstaloError } from "@instalo/core";
import { nextInstallmentStatus } from "./state-machines.js";

export interface RowAllocation {
	scheduleId: string;
	installmentNumber: number;
	amount: number;
}

export interface DistributionResult {
	/** Every row, ordered by installment number */
	rows: Installment[];
	/** Rows whose paid amount or status changed */
	changed: Installment[];
	allocations: RowAllocation[];
}

export function rowRemaining(row: Pick<Installment, "amount" | "paidAmount">): number {
	return row.amount - row.paidAmount;
}

function isOpen(row: Installment): boolean {
	return row.status === "pending" || row.status === "overdue";
}

/** Pending rows past their due date are reported as overdue. */
export function refreshOverdue(rows: readonly Installment[], now: Date): Installment[] {
	return rows.map((row) =>
		row.status === "pending" && row.dueDate.getTime() < now.getTime()
			? { ...row, status: nextInstallmentStatus(row.status, { type: "overdue" }) }
			: row,
	);
}

export function hasOverdueInstallments(rows: readonly Installment[]): boolean {
	return rows.some((row) => row.status === "overdue");
}

export function distributePayment(
	rows: readonly Installment[],
	amount: number,
	now: Date,
): DistributionResult {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw InstaloError.invalidAmount("Payment amount must be a positive integer", { amount });
	}

	const ordered = [...rows].sort((a, b) => a.installmentNumber - b.installmentNumber);
	const outstanding = ordered.filter(isOpen).reduce((acc, row) => acc + rowRemaining(row), 0);
	if (amount > outstanding) {
		throw InstaloError.invalidAmount("Payment exceeds the remaining balance", {
			amount,
			remainingBalance: outstanding,
		});
	}

	let left = amount;
	const changed: Installment[] = [];
	const allocations: RowAllocation[] = [];

	const updated = ordered.map((row) => {
		if (left === 0 || !isOpen(row)) return row;
		const applied = Math.min(left, rowRemaining(row));
		if (applied === 0) return row;
		left -= applied;

		const paidAmount = row.paidAmount + applied;
		const fullyPaid = paidAmount === row.amount;
		const next: Installment = {
			...row,
			paidAmount,
			status: nextInstallmentStatus(row.status, { type: "payment", fullyPaid }),
			paidAt: fullyPaid ? now : row.paidAt,
		};
		changed.push(next);
		allocations.push({
			scheduleId: row.id,
			installmentNumber: row.installmentNumber,
			amount: applied,
		});
		return next;
	});

	return { rows: updated, changed, allocations };
}
