// =============================================================================
// TRANSACTION MANAGER -- Financed purchases, their plans and schedules
// =============================================================================

import type {
	CreditTransaction,
	Installment,
	InstaloContext,
	InstaloTransactionAdapter,
	PaginatedResult,
	PaginationParams,
	RepaymentPlan,
	TransactionStatus,
} from "@instalo/core";
import { InstaloError, requireOneOf, TRANSACTION_STATUSES } from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { listPage } from "./paging.js";
import { hasOverdueInstallments, refreshOverdue } from "./payment-distribution.js";
import { toInstallment, toPlan, toTransaction } from "./rows.js";
import { nextPlanStatus, nextTransactionStatus } from "./state-machines.js";
import { findRow, lockRow, updateVersioned } from "./versioned.js";

export interface TransactionSchedule {
	transaction: CreditTransaction;
	plan: RepaymentPlan;
	schedule: Installment[];
}

// =============================================================================
// LOADERS (shared with the payment manager)
// =============================================================================

export function lockTransaction(
	tx: InstaloTransactionAdapter,
	transactionId: string,
): Promise<CreditTransaction> {
	return lockRow(tx, MODELS.transaction, transactionId, toTransaction, "Transaction");
}

export async function lockPlanFor(
	tx: InstaloTransactionAdapter,
	transactionId: string,
): Promise<RepaymentPlan> {
	const row = await tx.findOne({
		model: MODELS.plan,
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
		forUpdate: true,
	});
	if (!row) throw InstaloError.notFound(`Repayment plan for transaction ${transactionId} not found`);
	return toPlan(row);
}

export async function loadSchedule(
	adapter: Pick<InstaloTransactionAdapter, "findMany">,
	transactionId: string,
): Promise<Installment[]> {
	const rows = await adapter.findMany({
		model: MODELS.schedule,
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
		sortBy: { field: "installmentNumber", direction: "asc" },
	});
	return rows.map(toInstallment);
}

/** Persist rows whose status or paid amount differs from the stored version. */
export async function saveScheduleChanges(
	tx: InstaloTransactionAdapter,
	stored: readonly Installment[],
	next: readonly Installment[],
	now: Date,
): Promise<Installment[]> {
	const byId = new Map(stored.map((row) => [row.id, row]));
	const saved: Installment[] = [];
	for (const row of next) {
		const before = byId.get(row.id);
		if (!before || (before.status === row.status && before.paidAmount === row.paidAmount)) {
			saved.push(row);
			continue;
		}
		saved.push(
			await updateVersioned(tx, {
				model: MODELS.schedule,
				current: before,
				changes: { status: row.status, paidAmount: row.paidAmount, paidAt: row.paidAt },
				map: toInstallment,
				now,
			}),
		);
	}
	return saved;
}

/** Active transactions with a lapsed installment read as overdue. */
export function presentTransaction(
	transaction: CreditTransaction,
	schedule: readonly Installment[],
): CreditTransaction {
	if (transaction.status === "active" && hasOverdueInstallments(schedule)) {
		return { ...transaction, status: "overdue" };
	}
	return transaction;
}

// =============================================================================
// READS
// =============================================================================

export async function getTransaction(
	ctx: InstaloContext,
	transactionId: string,
	options: { now?: Date } = {},
): Promise<CreditTransaction> {
	const transaction = await findRow(
		ctx.adapter,
		MODELS.transaction,
		transactionId,
		toTransaction,
		"Transaction",
	);
	const schedule = refreshOverdue(await loadSchedule(ctx.adapter, transactionId), options.now ?? ctx.clock());
	return presentTransaction(transaction, schedule);
}

export async function getTransactionSchedule(
	ctx: InstaloContext,
	transactionId: string,
	options: { now?: Date } = {},
): Promise<TransactionSchedule> {
	const now = options.now ?? ctx.clock();
	const transaction = await findRow(
		ctx.adapter,
		MODELS.transaction,
		transactionId,
		toTransaction,
		"Transaction",
	);
	const planRow = await ctx.adapter.findOne({
		model: MODELS.plan,
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
	});
	if (!planRow) throw InstaloError.notFound(`Repayment plan for transaction ${transactionId} not found`);
	const schedule = refreshOverdue(await loadSchedule(ctx.adapter, transactionId), now);
	return {
		transaction: presentTransaction(transaction, schedule),
		plan: toPlan(planRow),
		schedule,
	};
}

/** Ids of transactions holding an unpaid installment that fell due before `now`. */
async function lapsedTransactionIds(ctx: InstaloContext, now: Date): Promise<Set<string>> {
	const rows = await ctx.adapter.findMany({
		model: MODELS.schedule,
		where: [
			{ field: "status", operator: "in", value: ["pending", "overdue"] },
			{ field: "dueDate", operator: "lt", value: now },
		],
	});
	return new Set(rows.map((row) => toInstallment(row).transactionId));
}

/**
 * Status filters follow the presented status: an active transaction with a
 * lapsed installment lists under `overdue`, not `active`.
 */
export async function listTransactions(
	ctx: InstaloContext,
	params: PaginationParams & {
		customerId?: string;
		merchantId?: string;
		status?: TransactionStatus;
		now?: Date;
	} = {},
): Promise<PaginatedResult<CreditTransaction>> {
	const now = params.now ?? ctx.clock();
	const where: Where[] = [];
	if (params.customerId !== undefined) {
		where.push({ field: "customerId", operator: "eq", value: params.customerId });
	}
	if (params.merchantId !== undefined) {
		where.push({ field: "merchantId", operator: "eq", value: params.merchantId });
	}
	if (params.status !== undefined) {
		const status = requireOneOf(params.status, TRANSACTION_STATUSES, "status");
		if (status === "overdue") {
			// Overdue rows only arise from a lapsed installment, so both stored states qualify.
			const lapsed = await lapsedTransactionIds(ctx, now);
			where.push(
				{ field: "status", operator: "in", value: ["active", "overdue"] },
				{ field: "id", operator: "in", value: [...lapsed] },
			);
		} else if (status === "active") {
			const lapsed = await lapsedTransactionIds(ctx, now);
			const active = await ctx.adapter.findMany({
				model: MODELS.transaction,
				where: [...where, { field: "status", operator: "eq", value: "active" }],
			});
			const current = active.map((row) => toTransaction(row).id).filter((id) => !lapsed.has(id));
			where.push(
				{ field: "status", operator: "eq", value: "active" },
				{ field: "id", operator: "in", value: current },
			);
		} else {
			where.push({ field: "status", operator: "eq", value: status });
		}
	}

	const page = await listPage(ctx.adapter, {
		model: MODELS.transaction,
		where,
		pagination: params,
		map: toTransaction,
	});

	const data: CreditTransaction[] = [];
	for (const transaction of page.data) {
		if (transaction.status !== "active") {
			data.push(transaction);
			continue;
		}
		const schedule = refreshOverdue(await loadSchedule(ctx.adapter, transaction.id), now);
		data.push(presentTransaction(transaction, schedule));
	}
	return { ...page, data };
}

// =============================================================================
// OVERDUE SWEEP
// =============================================================================

export async function markOverdue(
	ctx: InstaloContext,
	options: { now?: Date } = {},
): Promise<{ transactions: number; installments: number }> {
	const now = options.now ?? ctx.clock();
	const lapsed = await ctx.adapter.findMany({
		model: MODELS.schedule,
		where: [
			{ field: "status", operator: "eq", value: "pending" },
			{ field: "dueDate", operator: "lt", value: now },
		],
	});
	const transactionIds = [...new Set(lapsed.map((row) => toInstallment(row).transactionId))];

	let transactions = 0;
	let installments = 0;
	for (const transactionId of transactionIds) {
		const result = await withTransaction(ctx, async (tx) => {
			const transaction = await lockTransaction(tx, transactionId);
			const stored = await loadSchedule(tx, transactionId);
			const refreshed = refreshOverdue(stored, now);
			const flipped = refreshed.filter((row, i) => row.status !== stored[i]?.status).length;
			await saveScheduleChanges(tx, stored, refreshed, now);

			if (transaction.status !== "active" || !hasOverdueInstallments(refreshed)) {
				return { transaction: false, flipped };
			}
			await updateVersioned(tx, {
				model: MODELS.transaction,
				current: transaction,
				changes: { status: nextTransactionStatus(transaction.status, { type: "overdue" }) },
				map: toTransaction,
				now,
			});
			return { transaction: true, flipped };
		});
		if (result.transaction) transactions++;
		installments += result.flipped;
	}

	if (transactions > 0 || installments > 0) {
		ctx.logger.info("Marked overdue installments", { transactions, installments });
	}
	return { transactions, installments };
}

// =============================================================================
// DEFAULT
// =============================================================================

/**
 * Write off an overdue transaction. The plan is defaulted too; the customer's
 * outstanding credit stays reserved.
 */
export async function markDefaulted(
	ctx: InstaloContext,
	params: { transactionId: string },
): Promise<TransactionSchedule> {
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const transaction = await lockTransaction(tx, params.transactionId);
		const plan = await lockPlanFor(tx, transaction.id);
		const stored = await loadSchedule(tx, transaction.id);
		const schedule = await saveScheduleChanges(tx, stored, refreshOverdue(stored, now), now);

		const effective = presentTransaction(transaction, schedule);
		const defaultedTransaction = await updateVersioned(tx, {
			model: MODELS.transaction,
			current: transaction,
			changes: { status: nextTransactionStatus(effective.status, { type: "default" }) },
			map: toTransaction,
			now,
		});
		const defaultedPlan = await updateVersioned(tx, {
			model: MODELS.plan,
			current: plan,
			changes: { status: nextPlanStatus(plan.status, { type: "default" }) },
			map: toPlan,
			now,
		});

		queueAfterTransactionHook(() => {
			ctx.logger.warn("Transaction defaulted", {
				transactionId: transaction.id,
				customerId: transaction.customerId,
				remainingBalance: transaction.remainingBalance,
			});
		});
		return { transaction: defaultedTransaction, plan: defaultedPlan, schedule };
	});
}
