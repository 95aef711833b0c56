// =============================================================================
// PURCHASE REQUEST MANAGER -- Merchant-initiated requests and their outcomes
// =============================================================================
// pending -> accepted | rejected | cancelled | expired. A pending request past
// its expiry reads as expired everywhere. When a write touches one, the flip
// to `expired` is committed first and the caller then gets REQUEST_EXPIRED.

import type {
	CreditTransaction,
	Installment,
	InstaloContext,
	InstaloTransactionAdapter,
	PaginatedResult,
	PaginationParams,
	PurchaseRequest,
	PurchaseRequestStatus,
	RepaymentPlan,
} from "@instalo/core";
import {
	addHoursTo,
	generateId,
	generateReference,
	InstaloError,
	isInstaloError,
	optionalString,
	PURCHASE_REQUEST_STATUSES,
	requireOneOf,
	requirePositiveInteger,
	requireString,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { computeNet } from "./commission.js";
import { lockCustomer, reserveCredit, saveCreditBalances } from "./credit-ledger.js";
import { getCustomer, getCustomerByCode } from "./customer-manager.js";
import { assertScheduleSum, firstDueDate, generateSchedule } from "./installment-plan.js";
import { getMerchant, lockMerchant } from "./merchant-manager.js";
import { listPage } from "./paging.js";
import { toInstallment, toPlan, toPurchaseRequest, toTransaction } from "./rows.js";
import { accrueIncome } from "./settlement-manager.js";
import { nextPurchaseRequestStatus, type PurchaseRequestEvent } from "./state-machines.js";
import { findRow, lockRow, updateVersioned } from "./versioned.js";

// =============================================================================
// EXPIRY
// =============================================================================

export function isExpired(request: Pick<PurchaseRequest, "status" | "expiresAt">, now: Date): boolean {
	return request.status === "pending" && now.getTime() >= request.expiresAt.getTime();
}

/** The request as readers should see it. */
export function presentRequest(request: PurchaseRequest, now: Date): PurchaseRequest {
	return isExpired(request, now) ? { ...request, status: "expired" } : request;
}

function persistStatus(
	tx: InstaloTransactionAdapter,
	request: PurchaseRequest,
	event: PurchaseRequestEvent,
	now: Date,
	changes: Record<string, unknown> = {},
): Promise<PurchaseRequest> {
	return updateVersioned(tx, {
		model: MODELS.purchaseRequest,
		current: request,
		changes: { status: nextPurchaseRequestStatus(request.status, event), ...changes },
		map: toPurchaseRequest,
		now,
	});
}

type WriteOutcome<T> = { kind: "done"; value: T } | { kind: "expired"; request: PurchaseRequest };

/**
 * Lock the request and run `fn`, unless it has lapsed: then persist the
 * expiry, commit, and fail with REQUEST_EXPIRED.
 */
async function withLiveRequest<T>(
	ctx: InstaloContext,
	requestId: string,
	now: Date,
	fn: (tx: InstaloTransactionAdapter, request: PurchaseRequest) => Promise<T>,
): Promise<T> {
	const outcome = await withTransaction(ctx, async (tx): Promise<WriteOutcome<T>> => {
		const request = await lockRow(
			tx,
			MODELS.purchaseRequest,
			requestId,
			toPurchaseRequest,
			"Purchase request",
		);
		if (isExpired(request, now)) {
			return { kind: "expired", request: await persistStatus(tx, request, "expire", now) };
		}
		return { kind: "done", value: await fn(tx, request) };
	});

	if (outcome.kind === "expired") {
		ctx.logger.info("Purchase request expired on write", { requestId });
		throw InstaloError.requestExpired(
			`Purchase request ${outcome.request.referenceNumber} expired at ${outcome.request.expiresAt.toISOString()}`,
		);
	}
	return outcome.value;
}

// =============================================================================
// SEND
// =============================================================================

export async function sendPurchaseRequest(
	ctx: InstaloContext,
	params: {
		merchantId: string;
		customerId?: string;
		customerCode?: string;
		productName: string;
		quantity: number;
		unitPrice: number;
		description?: string;
	},
): Promise<PurchaseRequest> {
	const merchantId = requireString(params.merchantId, "merchantId");
	const productName = requireString(params.productName, "productName", { maxLength: 200 });
	const description = optionalString(params.description, "description", { maxLength: 1000 });
	const quantity = requirePositiveInteger(params.quantity, "quantity");
	const unitPrice = requirePositiveInteger(params.unitPrice, "unitPrice");
	const totalAmount = quantity * unitPrice;
	const { maxTransactionAmount } = ctx.options.advanced;

	if (!Number.isSafeInteger(totalAmount) || totalAmount > maxTransactionAmount) {
		throw InstaloError.validation("Purchase total exceeds the maximum transaction amount", {
			totalAmount,
			maxTransactionAmount,
		});
	}
	if (params.customerId === undefined && params.customerCode === undefined) {
		throw InstaloError.validation("customerId or customerCode is required");
	}

	const merchant = await getMerchant(ctx, merchantId).catch(rethrowAsValidation);
	if (merchant.status !== "active") {
		throw InstaloError.validation(`Merchant is ${merchant.status}`, { merchantId });
	}
	const customer = await (params.customerId !== undefined
		? getCustomer(ctx, params.customerId)
		: getCustomerByCode(ctx, params.customerCode ?? "")
	).catch(rethrowAsValidation);
	if (customer.status !== "active") {
		throw InstaloError.validation(`Customer is ${customer.status}`, { customerId: customer.id });
	}

	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const request = toPurchaseRequest(
			await tx.create({
				model: MODELS.purchaseRequest,
				data: {
					id: generateId(),
					referenceNumber: generateReference("PR", now),
					merchantId: merchant.id,
					customerId: customer.id,
					productName,
					description,
					quantity,
					unitPrice,
					totalAmount,
					currency: ctx.options.currency,
					status: "pending",
					expiresAt: addHoursTo(now, ctx.options.requestTtlHours),
					rejectionReason: null,
					respondedAt: null,
					transactionId: null,
					version: 1,
					createdAt: now,
					updatedAt: now,
				},
			}),
		);
		queueAfterTransactionHook(() => {
			ctx.logger.info("Purchase request sent", {
				requestId: request.id,
				merchantId: merchant.id,
				customerId: customer.id,
				totalAmount,
			});
		});
		return request;
	});
}

function rethrowAsValidation(err: unknown): never {
	if (isInstaloError(err, "NOT_FOUND")) {
		throw InstaloError.validation(err.message);
	}
	throw err;
}

// =============================================================================
// ACCEPT
// =============================================================================

export interface AcceptedPurchase {
	request: PurchaseRequest;
	transaction: CreditTransaction;
	plan: RepaymentPlan;
	schedule: Installment[];
}

export async function acceptPurchaseRequest(
	ctx: InstaloContext,
	params: { requestId: string; planType: number; customerId?: string },
): Promise<AcceptedPurchase> {
	const planType = requireOneOf(params.planType, ctx.options.planTypes, "planType");
	const now = ctx.clock();

	return withLiveRequest(ctx, params.requestId, now, async (tx, request) => {
		if (params.customerId !== undefined && params.customerId !== request.customerId) {
			throw InstaloError.forbidden("Purchase request belongs to another customer");
		}
		const status = nextPurchaseRequestStatus(request.status, "accept");

		const dueFrom = firstDueDate(now, planType, ctx.options);
		const installments = generateSchedule({
			totalAmount: request.totalAmount,
			planType,
			firstDueDate: dueFrom,
		});
		assertScheduleSum(installments, request.totalAmount);
		const lastDueDate = installments[installments.length - 1]?.dueDate ?? dueFrom;

		const customer = await lockCustomer(tx, request.customerId);
		if (customer.status !== "active") {
			throw InstaloError.accountInactive(`Customer is ${customer.status}`);
		}
		await saveCreditBalances(tx, customer, reserveCredit(customer, request.totalAmount), now);

		const commissionRatePpm = ctx.options.commissionRatePpm;
		const { commissionAmount, netAmount } = computeNet(request.totalAmount, commissionRatePpm);

		const transaction = toTransaction(
			await tx.create({
				model: MODELS.transaction,
				data: {
					id: generateId(),
					referenceNumber: generateReference("TXN", now),
					purchaseRequestId: request.id,
					customerId: request.customerId,
					merchantId: request.merchantId,
					productName: request.productName,
					currency: request.currency,
					totalAmount: request.totalAmount,
					commissionRatePpm,
					commissionAmount,
					netAmount,
					paidAmount: 0,
					remainingBalance: request.totalAmount,
					status: "active",
					dueDate: lastDueDate,
					completedAt: null,
					version: 1,
					createdAt: now,
					updatedAt: now,
				},
			}),
		);

		const plan = toPlan(
			await tx.create({
				model: MODELS.plan,
				data: {
					id: generateId(),
					referenceNumber: generateReference("PLAN", now),
					transactionId: transaction.id,
					planType,
					totalAmount: request.totalAmount,
					installmentAmount: installments[0]?.amount ?? request.totalAmount,
					numberOfInstallments: planType,
					installmentsPaid: installments.filter((row) => row.amount === 0).length,
					amountPaid: 0,
					remainingAmount: request.totalAmount,
					firstDueDate: dueFrom,
					lastDueDate,
					status: "active",
					version: 1,
					createdAt: now,
					updatedAt: now,
				},
			}),
		);

		const schedule: Installment[] = [];
		for (const installment of installments) {
			schedule.push(
				toInstallment(
					await tx.create({
						model: MODELS.schedule,
						data: {
							id: generateId(),
							planId: plan.id,
							transactionId: transaction.id,
							installmentNumber: installment.installmentNumber,
							amount: installment.amount,
							dueDate: installment.dueDate,
							// Zero-amount rows (total smaller than the plan length) start settled
							status: installment.amount === 0 ? "paid" : "pending",
							paidAmount: 0,
							paidAt: installment.amount === 0 ? now : null,
							version: 1,
							createdAt: now,
							updatedAt: now,
						},
					}),
				),
			);
		}

		const merchant = await lockMerchant(tx, request.merchantId);
		await accrueIncome(tx, merchant, transaction, now);

		const updatedRequest = await updateVersioned(tx, {
			model: MODELS.purchaseRequest,
			current: request,
			changes: { status, respondedAt: now, transactionId: transaction.id },
			map: toPurchaseRequest,
			now,
		});

		queueAfterTransactionHook(() => {
			ctx.logger.info("Purchase request accepted", {
				requestId: request.id,
				transactionId: transaction.id,
				planType,
				totalAmount: request.totalAmount,
				commissionAmount,
			});
		});

		return { request: updatedRequest, transaction, plan, schedule };
	});
}

// =============================================================================
// REJECT / CANCEL
// =============================================================================

export async function rejectPurchaseRequest(
	ctx: InstaloContext,
	params: { requestId: string; reason?: string; customerId?: string },
): Promise<PurchaseRequest> {
	const reason = optionalString(params.reason, "reason", { maxLength: 500 });
	const now = ctx.clock();

	return withLiveRequest(ctx, params.requestId, now, async (tx, request) => {
		if (params.customerId !== undefined && params.customerId !== request.customerId) {
			throw InstaloError.forbidden("Purchase request belongs to another customer");
		}
		const rejected = await persistStatus(tx, request, "reject", now, {
			rejectionReason: reason,
			respondedAt: now,
		});
		queueAfterTransactionHook(() => {
			ctx.logger.info("Purchase request rejected", { requestId: request.id });
		});
		return rejected;
	});
}

export async function cancelPurchaseRequest(
	ctx: InstaloContext,
	params: { requestId: string; merchantId?: string },
): Promise<PurchaseRequest> {
	const now = ctx.clock();

	return withLiveRequest(ctx, params.requestId, now, async (tx, request) => {
		if (params.merchantId !== undefined && params.merchantId !== request.merchantId) {
			throw InstaloError.forbidden("Purchase request belongs to another merchant");
		}
		const cancelled = await persistStatus(tx, request, "cancel", now);
		queueAfterTransactionHook(() => {
			ctx.logger.info("Purchase request cancelled", { requestId: request.id });
		});
		return cancelled;
	});
}

// =============================================================================
// READS
// =============================================================================

export async function getPurchaseRequest(
	ctx: InstaloContext,
	requestId: string,
	options: { now?: Date } = {},
): Promise<PurchaseRequest> {
	const request = await findRow(
		ctx.adapter,
		MODELS.purchaseRequest,
		requestId,
		toPurchaseRequest,
		"Purchase request",
	);
	return presentRequest(request, options.now ?? ctx.clock());
}

/** Status filters follow the presented status, so lapsed pending rows list as expired. */
export async function listPurchaseRequests(
	ctx: InstaloContext,
	params: PaginationParams & {
		merchantId?: string;
		customerId?: string;
		status?: PurchaseRequestStatus;
		now?: Date;
	} = {},
): Promise<PaginatedResult<PurchaseRequest>> {
	const now = params.now ?? ctx.clock();
	const where: Where[] = [];
	if (params.merchantId !== undefined) {
		where.push({ field: "merchantId", operator: "eq", value: params.merchantId });
	}
	if (params.customerId !== undefined) {
		where.push({ field: "customerId", operator: "eq", value: params.customerId });
	}
	if (params.status !== undefined) {
		const status = requireOneOf(params.status, PURCHASE_REQUEST_STATUSES, "status");
		if (status === "pending") {
			where.push(
				{ field: "status", operator: "eq", value: "pending" },
				{ field: "expiresAt", operator: "gt", value: now },
			);
		} else if (status === "expired") {
			where.push(
				{ field: "status", operator: "in", value: ["pending", "expired"] },
				{ field: "expiresAt", operator: "lte", value: now },
			);
		} else {
			where.push({ field: "status", operator: "eq", value: status });
		}
	}

	const page = await listPage(ctx.adapter, {
		model: MODELS.purchaseRequest,
		where,
		pagination: params,
		map: toPurchaseRequest,
	});
	return { ...page, data: page.data.map((request) => presentRequest(request, now)) };
}

// =============================================================================
// SWEEP
// =============================================================================

/** Persist `expired` on every lapsed pending request. */
export async function expireStaleRequests(
	ctx: InstaloContext,
	options: { now?: Date; batchSize?: number } = {},
): Promise<{ expired: number }> {
	const now = options.now ?? ctx.clock();
	const stale = await ctx.adapter.findMany({
		model: MODELS.purchaseRequest,
		where: [
			{ field: "status", operator: "eq", value: "pending" },
			{ field: "expiresAt", operator: "lte", value: now },
		],
		limit: options.batchSize ?? 1000,
		sortBy: { field: "expiresAt", direction: "asc" },
	});

	let expired = 0;
	for (const row of stale) {
		const requestId = toPurchaseRequest(row).id;
		const flipped = await withTransaction(ctx, async (tx) => {
			const request = await lockRow(
				tx,
				MODELS.purchaseRequest,
				requestId,
				toPurchaseRequest,
				"Purchase request",
			);
			// Re-check under the lock: another writer may have settled it.
			if (!isExpired(request, now)) return false;
			await persistStatus(tx, request, "expire", now);
			return true;
		});
		if (flipped) expired++;
	}

	if (expired > 0) {
		ctx.logger.info("Expired stale purchase requests", { count: expired });
	}
	return { expired };
}
