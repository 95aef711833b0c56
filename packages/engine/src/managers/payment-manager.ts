// =============================================================================
// PAYMENT MANAGER -- Applies payments to a transaction's schedule
// =============================================================================
// One payment = one database transaction: schedule rows, plan, transaction,
// the customer's credit and the payment records commit together or not at all.

import type {
	CreditTransaction,
	Installment,
	InstaloContext,
	PaginatedResult,
	PaginationParams,
	Payment,
	PaymentAllocation,
	PaymentMethod,
	RepaymentPlan,
} from "@instalo/core";
import {
	addCalendarDays,
	generateId,
	generateReference,
	InstaloError,
	PAYMENT_METHODS,
	requireOneOf,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { differenceInDays } from "date-fns";
import { withTransaction } from "../infrastructure/transaction.js";
import { lockCustomer, releaseCredit, saveCreditBalances } from "./credit-ledger.js";
import { listPage } from "./paging.js";
import {
	distributePayment,
	hasOverdueInstallments,
	refreshOverdue,
	rowRemaining,
} from "./payment-distribution.js";
import { toAllocation, toInstallment, toPayment, toPlan, toTransaction } from "./rows.js";
import { canAcceptPayments, nextPlanStatus, nextTransactionStatus } from "./state-machines.js";
import {
	loadSchedule,
	lockPlanFor,
	lockTransaction,
	saveScheduleChanges,
} from "./transaction-manager.js";
import { findRow, updateVersioned } from "./versioned.js";

export interface AppliedPayment {
	payment: Payment;
	transaction: CreditTransaction;
	plan: RepaymentPlan;
	schedule: Installment[];
	allocations: PaymentAllocation[];
}

export interface PaymentWithAllocations extends Payment {
	allocations: PaymentAllocation[];
}

/** An open installment as shown in upcoming/overdue views. */
export interface InstallmentDue {
	scheduleId: string;
	planId: string;
	transactionId: string;
	transactionReference: string;
	customerId: string;
	installmentNumber: number;
	amount: number;
	paidAmount: number;
	remainingAmount: number;
	dueDate: Date;
	isOverdue: boolean;
	daysOverdue: number;
}

// =============================================================================
// MAKE PAYMENT
// =============================================================================

export async function makePayment(
	ctx: InstaloContext,
	params: {
		transactionId: string;
		amount: number;
		paymentMethod?: PaymentMethod;
		customerId?: string;
	},
): Promise<AppliedPayment> {
	const { amount } = params;
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw InstaloError.invalidAmount("Payment amount must be a positive integer", { amount });
	}
	const paymentMethod = requireOneOf(params.paymentMethod ?? "wallet", PAYMENT_METHODS, "paymentMethod");
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const transaction = await lockTransaction(tx, params.transactionId);
		if (params.customerId !== undefined && params.customerId !== transaction.customerId) {
			throw InstaloError.forbidden("Transaction belongs to another customer");
		}
		if (!canAcceptPayments(transaction.status)) {
			throw InstaloError.transactionNotActive(`Transaction is ${transaction.status}`);
		}
		if (amount > transaction.remainingBalance) {
			throw InstaloError.invalidAmount("Payment exceeds the remaining balance", {
				amount,
				remainingBalance: transaction.remainingBalance,
			});
		}

		const plan = await lockPlanFor(tx, transaction.id);
		const stored = await loadSchedule(tx, transaction.id);
		const distribution = distributePayment(refreshOverdue(stored, now), amount, now);
		const schedule = await saveScheduleChanges(tx, stored, distribution.rows, now);

		const remainingBalance = transaction.remainingBalance - amount;
		const scheduleRemaining = schedule.reduce(
			(acc, row) => acc + (row.status === "skipped" ? 0 : rowRemaining(row)),
			0,
		);
		if (scheduleRemaining !== remainingBalance) {
			throw InstaloError.invariantViolation("Schedule and transaction balances disagree", {
				transactionId: transaction.id,
				scheduleRemaining,
				remainingBalance,
			});
		}

		const status = nextTransactionStatus(transaction.status, {
			type: "payment",
			remainingBalance,
			hasOverdueInstallments: hasOverdueInstallments(schedule),
		});
		const updatedTransaction = await updateVersioned(tx, {
			model: MODELS.transaction,
			current: transaction,
			changes: {
				paidAmount: transaction.paidAmount + amount,
				remainingBalance,
				status,
				completedAt: status === "completed" ? now : transaction.completedAt,
			},
			map: toTransaction,
			now,
		});

		const planRemaining = plan.remainingAmount - amount;
		const updatedPlan = await updateVersioned(tx, {
			model: MODELS.plan,
			current: plan,
			changes: {
				installmentsPaid: schedule.filter((row) => row.status === "paid").length,
				amountPaid: plan.amountPaid + amount,
				remainingAmount: planRemaining,
				status: nextPlanStatus(plan.status, { type: "payment", remainingAmount: planRemaining }),
			},
			map: toPlan,
			now,
		});

		const customer = await lockCustomer(tx, transaction.customerId);
		await saveCreditBalances(tx, customer, releaseCredit(customer, amount), now);

		const payment = toPayment(
			await tx.create({
				model: MODELS.payment,
				data: {
					id: generateId(),
					referenceNumber: generateReference("PAY", now),
					transactionId: transaction.id,
					customerId: transaction.customerId,
					amount,
					currency: transaction.currency,
					paymentMethod,
					status: "completed",
					createdAt: now,
				},
			}),
		);

		const allocations: PaymentAllocation[] = [];
		for (const allocation of distribution.allocations) {
			allocations.push(
				toAllocation(
					await tx.create({
						model: MODELS.paymentAllocation,
						data: { id: generateId(), paymentId: payment.id, ...allocation, createdAt: now },
					}),
				),
			);
		}

		queueAfterTransactionHook(() => {
			ctx.logger.info("Payment applied", {
				paymentId: payment.id,
				transactionId: transaction.id,
				amount,
				remainingBalance,
				status,
			});
		});

		return {
			payment,
			transaction: updatedTransaction,
			plan: updatedPlan,
			schedule,
			allocations,
		};
	});
}

// =============================================================================
// READS
// =============================================================================

export async function getPayment(
	ctx: InstaloContext,
	paymentId: string,
): Promise<PaymentWithAllocations> {
	const payment = await findRow(ctx.adapter, MODELS.payment, paymentId, toPayment, "Payment");
	const allocations = await ctx.adapter.findMany({
		model: MODELS.paymentAllocation,
		where: [{ field: "paymentId", operator: "eq", value: paymentId }],
		sortBy: { field: "installmentNumber", direction: "asc" },
	});
	return { ...payment, allocations: allocations.map(toAllocation) };
}

export function listPayments(
	ctx: InstaloContext,
	params: PaginationParams & { transactionId?: string; customerId?: string } = {},
): Promise<PaginatedResult<Payment>> {
	const where: Where[] = [];
	if (params.transactionId !== undefined) {
		where.push({ field: "transactionId", operator: "eq", value: params.transactionId });
	}
	if (params.customerId !== undefined) {
		where.push({ field: "customerId", operator: "eq", value: params.customerId });
	}
	return listPage(ctx.adapter, {
		model: MODELS.payment,
		where,
		pagination: params,
		map: toPayment,
	});
}

async function openInstallments(
	ctx: InstaloContext,
	params: { customerId?: string; dueBefore: Date; inclusive: boolean; now: Date },
): Promise<InstallmentDue[]> {
	const transactionWhere: Where[] = [
		{ field: "status", operator: "in", value: ["active", "overdue"] },
	];
	if (params.customerId !== undefined) {
		transactionWhere.push({ field: "customerId", operator: "eq", value: params.customerId });
	}
	const transactions = (
		await ctx.adapter.findMany({ model: MODELS.transaction, where: transactionWhere })
	).map(toTransaction);
	if (transactions.length === 0) return [];

	const byId = new Map(transactions.map((t) => [t.id, t]));
	const rows = (
		await ctx.adapter.findMany({
			model: MODELS.schedule,
			where: [
				{ field: "transactionId", operator: "in", value: [...byId.keys()] },
				{ field: "status", operator: "in", value: ["pending", "overdue"] },
				{ field: "dueDate", operator: params.inclusive ? "lte" : "lt", value: params.dueBefore },
			],
			sortBy: { field: "dueDate", direction: "asc" },
		})
	).map(toInstallment);

	const views: InstallmentDue[] = [];
	for (const row of refreshOverdue(rows, params.now)) {
		const transaction = byId.get(row.transactionId);
		if (!transaction) continue;
		const isOverdue = row.status === "overdue";
		views.push({
			scheduleId: row.id,
			planId: row.planId,
			transactionId: transaction.id,
			transactionReference: transaction.referenceNumber,
			customerId: transaction.customerId,
			installmentNumber: row.installmentNumber,
			amount: row.amount,
			paidAmount: row.paidAmount,
			remainingAmount: rowRemaining(row),
			dueDate: row.dueDate,
			isOverdue,
			daysOverdue: isOverdue ? differenceInDays(params.now, row.dueDate) : 0,
		});
	}
	return views;
}

/** Open installments falling due within the next `withinDays` days, overdue ones included. */
export async function getUpcomingPayments(
	ctx: InstaloContext,
	params: { customerId: string; withinDays?: number; now?: Date },
): Promise<InstallmentDue[]> {
	const now = params.now ?? ctx.clock();
	const withinDays = params.withinDays ?? 30;
	if (!Number.isSafeInteger(withinDays) || withinDays < 0) {
		throw InstaloError.validation("withinDays must be a non-negative integer", { withinDays });
	}
	return openInstallments(ctx, {
		customerId: params.customerId,
		dueBefore: addCalendarDays(now, withinDays),
		inclusive: true,
		now,
	});
}

export function getOverduePayments(
	ctx: InstaloContext,
	params: { customerId?: string; now?: Date } = {},
): Promise<InstallmentDue[]> {
	const now = params.now ?? ctx.clock();
	return openInstallments(ctx, { customerId: params.customerId, dueBefore: now, inclusive: false, now });
}
