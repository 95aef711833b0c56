// =============================================================================
// LIMIT MANAGER -- Credit limit increase workflow
// =============================================================================
// Requests up to the auto-approve threshold apply immediately; larger ones wait
// for an admin. Approval re-validates against the limit at that moment.

import type {
	CustomerLimitHistory,
	InstaloContext,
	PaginatedResult,
	PaginationParams,
} from "@instalo/core";
import {
	generateId,
	optionalString,
	requirePositiveInteger,
	requireString,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { lockCustomer, raiseLimit, saveCreditBalances } from "./credit-ledger.js";
import { getCustomer } from "./customer-manager.js";
import { listPage } from "./paging.js";
import { toLimitHistory } from "./rows.js";
import { nextLimitRequestStatus } from "./state-machines.js";
import { lockRow, updateVersioned } from "./versioned.js";

export const AUTO_APPROVER = "auto";

export async function requestLimitIncrease(
	ctx: InstaloContext,
	params: { customerId: string; newLimit: number; reason?: string },
): Promise<CustomerLimitHistory> {
	const newLimit = requirePositiveInteger(params.newLimit, "newLimit");
	const reason = optionalString(params.reason, "reason", { maxLength: 500 });
	const { maxCreditLimit, autoApproveLimit } = ctx.options.creditPolicy;
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const customer = await lockCustomer(tx, params.customerId);
		// Validates max and strictly-greater before anything is written
		const raised = raiseLimit(customer, newLimit, maxCreditLimit);
		const autoApprove = newLimit <= autoApproveLimit;

		if (autoApprove) {
			await saveCreditBalances(tx, customer, raised, now);
		}

		const entry = toLimitHistory(
			await tx.create({
				model: MODELS.limitHistory,
				data: {
					id: generateId(),
					customerId: customer.id,
					previousLimit: customer.creditLimit,
					requestedLimit: newLimit,
					reason,
					status: autoApprove ? "approved" : "pending",
					decidedBy: autoApprove ? AUTO_APPROVER : null,
					decisionReason: autoApprove ? "Within auto-approve threshold" : null,
					decidedAt: autoApprove ? now : null,
					version: 1,
					createdAt: now,
				},
			}),
		);

		queueAfterTransactionHook(() => {
			ctx.logger.info("Credit limit increase requested", {
				customerId: customer.id,
				requestId: entry.id,
				previousLimit: customer.creditLimit,
				requestedLimit: newLimit,
				status: entry.status,
			});
		});
		return entry;
	});
}

export async function approveLimitIncrease(
	ctx: InstaloContext,
	params: { requestId: string; approvedBy: string; reason?: string },
): Promise<CustomerLimitHistory> {
	const approvedBy = requireString(params.approvedBy, "approvedBy", { maxLength: 255 });
	const reason = optionalString(params.reason, "reason", { maxLength: 500 });
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const entry = await lockRow(
			tx,
			MODELS.limitHistory,
			params.requestId,
			toLimitHistory,
			"Limit request",
		);
		const status = nextLimitRequestStatus(entry.status, "approve");
		const customer = await lockCustomer(tx, entry.customerId);
		await saveCreditBalances(
			tx,
			customer,
			raiseLimit(customer, entry.requestedLimit, ctx.options.creditPolicy.maxCreditLimit),
			now,
		);

		const approved = await updateVersioned(tx, {
			model: MODELS.limitHistory,
			current: entry,
			changes: {
				status,
				previousLimit: customer.creditLimit,
				decidedBy: approvedBy,
				decisionReason: reason,
				decidedAt: now,
			},
			map: toLimitHistory,
		});

		queueAfterTransactionHook(() => {
			ctx.logger.info("Credit limit increase approved", {
				customerId: customer.id,
				requestId: entry.id,
				newLimit: entry.requestedLimit,
				approvedBy,
			});
		});
		return approved;
	});
}

export async function rejectLimitIncrease(
	ctx: InstaloContext,
	params: { requestId: string; rejectedBy: string; reason?: string },
): Promise<CustomerLimitHistory> {
	const rejectedBy = requireString(params.rejectedBy, "rejectedBy", { maxLength: 255 });
	const reason = optionalString(params.reason, "reason", { maxLength: 500 });
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const entry = await lockRow(
			tx,
			MODELS.limitHistory,
			params.requestId,
			toLimitHistory,
			"Limit request",
		);
		const rejected = await updateVersioned(tx, {
			model: MODELS.limitHistory,
			current: entry,
			changes: {
				status: nextLimitRequestStatus(entry.status, "reject"),
				decidedBy: rejectedBy,
				decisionReason: reason,
				decidedAt: now,
			},
			map: toLimitHistory,
		});
		queueAfterTransactionHook(() => {
			ctx.logger.info("Credit limit increase rejected", { requestId: entry.id, rejectedBy });
		});
		return rejected;
	});
}

export async function getLimitHistory(
	ctx: InstaloContext,
	customerId: string,
): Promise<CustomerLimitHistory[]> {
	await getCustomer(ctx, customerId);
	const rows = await ctx.adapter.findMany({
		model: MODELS.limitHistory,
		where: [{ field: "customerId", operator: "eq", value: customerId }],
		sortBy: { field: "createdAt", direction: "desc" },
	});
	return rows.map(toLimitHistory);
}

export function listPendingLimitRequests(
	ctx: InstaloContext,
	params: PaginationParams = {},
): Promise<PaginatedResult<CustomerLimitHistory>> {
	return listPage(ctx.adapter, {
		model: MODELS.limitHistory,
		where: [{ field: "status", operator: "eq", value: "pending" }],
		pagination: params,
		sortBy: { field: "createdAt", direction: "asc" },
		map: toLimitHistory,
	});
}
