// =============================================================================
// MERCHANT MANAGER
// =============================================================================

import type {
	AccountStatus,
	BankDetails,
	InstaloContext,
	InstaloTransactionAdapter,
	Merchant,
	MerchantStats,
	PaginatedResult,
	PaginationParams,
} from "@instalo/core";
import {
	ACCOUNT_STATUSES,
	generateId,
	optionalString,
	requireOneOf,
	requireString,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { listPage } from "./paging.js";
import { toMerchant } from "./rows.js";
import { nextAccountStatus } from "./state-machines.js";
import { findRow, lockRow, updateVersioned } from "./versioned.js";

export function parseBankDetails(value: BankDetails): BankDetails {
	return {
		bankName: requireString(value.bankName, "bankName", { maxLength: 100 }),
		bankAccountNumber: requireString(value.bankAccountNumber, "bankAccountNumber", {
			maxLength: 50,
		}),
		iban: optionalString(value.iban, "iban", { maxLength: 34 }),
	};
}

export function lockMerchant(tx: InstaloTransactionAdapter, merchantId: string): Promise<Merchant> {
	return lockRow(tx, MODELS.merchant, merchantId, toMerchant, "Merchant");
}

export async function createMerchant(
	ctx: InstaloContext,
	params: { userId?: string; shopName: string; bankDetails?: BankDetails },
): Promise<Merchant> {
	const userId = optionalString(params.userId, "userId", { maxLength: 255 });
	const shopName = requireString(params.shopName, "shopName", { maxLength: 200 });
	const bank = params.bankDetails ? parseBankDetails(params.bankDetails) : null;
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const row = await tx.create({
			model: MODELS.merchant,
			data: {
				id: generateId(),
				userId,
				shopName,
				status: "active",
				balance: 0,
				totalTransactions: 0,
				totalVolume: 0,
				totalCommissionPaid: 0,
				bankName: bank?.bankName ?? null,
				bankAccountNumber: bank?.bankAccountNumber ?? null,
				iban: bank?.iban ?? null,
				version: 1,
				createdAt: now,
				updatedAt: now,
			},
		});
		const merchant = toMerchant(row);
		queueAfterTransactionHook(() => {
			ctx.logger.info("Merchant created", { merchantId: merchant.id, shopName });
		});
		return merchant;
	});
}

export function getMerchant(ctx: InstaloContext, merchantId: string): Promise<Merchant> {
	return findRow(ctx.adapter, MODELS.merchant, merchantId, toMerchant, "Merchant");
}

export async function listMerchants(
	ctx: InstaloContext,
	params: PaginationParams & { status?: AccountStatus } = {},
): Promise<PaginatedResult<Merchant>> {
	const where: Where[] = [];
	if (params.status !== undefined) {
		where.push({
			field: "status",
			operator: "eq",
			value: requireOneOf(params.status, ACCOUNT_STATUSES, "status"),
		});
	}
	return listPage(ctx.adapter, {
		model: MODELS.merchant,
		where,
		pagination: params,
		map: toMerchant,
	});
}

export async function setMerchantStatus(
	ctx: InstaloContext,
	params: { merchantId: string; status: AccountStatus },
): Promise<Merchant> {
	const target = requireOneOf(params.status, ACCOUNT_STATUSES, "status");
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const merchant = await lockMerchant(tx, params.merchantId);
		const status = nextAccountStatus(merchant.status, target);
		const updated = await updateVersioned(tx, {
			model: MODELS.merchant,
			current: merchant,
			changes: { status },
			map: toMerchant,
			now,
		});
		queueAfterTransactionHook(() => {
			ctx.logger.info("Merchant status changed", {
				merchantId: merchant.id,
				from: merchant.status,
				to: status,
			});
		});
		return updated;
	});
}

/**
 * Request counts per status (pending requests past their expiry count as
 * expired), lifetime totals and withdrawals still in flight.
 */
export async function getMerchantStats(
	ctx: InstaloContext,
	merchantId: string,
	options: { now?: Date } = {},
): Promise<MerchantStats> {
	const merchant = await getMerchant(ctx, merchantId);
	const now = options.now ?? ctx.clock();
	const { adapter } = ctx;
	const byMerchant: Where = { field: "merchantId", operator: "eq", value: merchantId };

	const countRequests = (where: Where[]) =>
		adapter.count({ model: MODELS.purchaseRequest, where: [byMerchant, ...where] });

	const inFlightWithdrawals: Where[] = [
		byMerchant,
		{ field: "settlementType", operator: "eq", value: "withdrawal" },
		{ field: "status", operator: "in", value: ["pending", "processing"] },
	];

	const [pending, stale, accepted, rejected, expired, cancelled, withdrawals, withdrawalAmount] =
		await Promise.all([
			countRequests([
				{ field: "status", operator: "eq", value: "pending" },
				{ field: "expiresAt", operator: "gt", value: now },
			]),
			countRequests([
				{ field: "status", operator: "eq", value: "pending" },
				{ field: "expiresAt", operator: "lte", value: now },
			]),
			countRequests([{ field: "status", operator: "eq", value: "accepted" }]),
			countRequests([{ field: "status", operator: "eq", value: "rejected" }]),
			countRequests([{ field: "status", operator: "eq", value: "expired" }]),
			countRequests([{ field: "status", operator: "eq", value: "cancelled" }]),
			adapter.count({ model: MODELS.settlement, where: inFlightWithdrawals }),
			adapter.sum({ model: MODELS.settlement, field: "netAmount", where: inFlightWithdrawals }),
		]);

	return {
		merchantId,
		balance: merchant.balance,
		totalTransactions: merchant.totalTransactions,
		totalVolume: merchant.totalVolume,
		totalCommissionPaid: merchant.totalCommissionPaid,
		requests: { pending, accepted, rejected, expired: expired + stale, cancelled },
		pendingWithdrawals: withdrawals,
		pendingWithdrawalAmount: withdrawalAmount,
	};
}
