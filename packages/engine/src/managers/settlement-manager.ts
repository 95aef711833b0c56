// =============================================================================
// SETTLEMENT MANAGER -- Merchant income accrual and withdrawals
// =============================================================================
// Income: the full net amount accrues when the transaction is created, as a
// settlement born `completed`. Withdrawals debit the balance up front and
// re-credit it if the payout fails.

import type {
	BankDetails,
	CreditTransaction,
	InstaloContext,
	InstaloTransactionAdapter,
	Merchant,
	PaginatedResult,
	PaginationParams,
	PlatformRevenue,
	Settlement,
	SettlementStatus,
	SettlementType,
} from "@instalo/core";
import {
	generateId,
	generateReference,
	InstaloError,
	optionalString,
	requireOneOf,
	requirePositiveInteger,
	requireString,
	SETTLEMENT_STATUSES,
	SETTLEMENT_TYPES,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { lockMerchant, parseBankDetails } from "./merchant-manager.js";
import { listPage } from "./paging.js";
import { toMerchant, toSettlement } from "./rows.js";
import { nextSettlementStatus, type SettlementEvent } from "./state-machines.js";
import { findRow, lockRow, updateVersioned } from "./versioned.js";

// =============================================================================
// INCOME
// =============================================================================

/** Runs inside the accept transaction, with the merchant row already locked. */
export async function accrueIncome(
	tx: InstaloTransactionAdapter,
	merchant: Merchant,
	transaction: CreditTransaction,
	now: Date,
): Promise<{ merchant: Merchant; settlement: Settlement }> {
	const settlement = toSettlement(
		await tx.create({
			model: MODELS.settlement,
			data: {
				id: generateId(),
				referenceNumber: generateReference("STL", now),
				merchantId: merchant.id,
				transactionId: transaction.id,
				settlementType: "income",
				grossAmount: transaction.totalAmount,
				commissionAmount: transaction.commissionAmount,
				netAmount: transaction.netAmount,
				currency: transaction.currency,
				status: "completed",
				bankName: null,
				bankAccountNumber: null,
				iban: null,
				bankReference: null,
				failureReason: null,
				processedAt: now,
				completedAt: now,
				version: 1,
				createdAt: now,
				updatedAt: now,
			},
		}),
	);

	const updated = await updateVersioned(tx, {
		model: MODELS.merchant,
		current: merchant,
		changes: {
			balance: merchant.balance + transaction.netAmount,
			totalTransactions: merchant.totalTransactions + 1,
			totalVolume: merchant.totalVolume + transaction.totalAmount,
			totalCommissionPaid: merchant.totalCommissionPaid + transaction.commissionAmount,
		},
		map: toMerchant,
		now,
	});

	return { merchant: updated, settlement };
}

// =============================================================================
// WITHDRAWALS
// =============================================================================

export async function requestWithdrawal(
	ctx: InstaloContext,
	params: { merchantId: string; amount: number; bankDetails: BankDetails },
): Promise<Settlement> {
	const amount = requirePositiveInteger(params.amount, "amount");
	const bank = parseBankDetails(params.bankDetails);
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const merchant = await lockMerchant(tx, params.merchantId);
		if (merchant.status !== "active") {
			throw InstaloError.accountInactive(`Merchant is ${merchant.status}`);
		}
		if (amount > merchant.balance) {
			throw InstaloError.insufficientBalance("Withdrawal exceeds merchant balance", {
				requested: amount,
				balance: merchant.balance,
			});
		}

		await updateVersioned(tx, {
			model: MODELS.merchant,
			current: merchant,
			changes: {
				balance: merchant.balance - amount,
				bankName: bank.bankName,
				bankAccountNumber: bank.bankAccountNumber,
				iban: bank.iban ?? null,
			},
			map: toMerchant,
			now,
		});

		const settlement = toSettlement(
			await tx.create({
				model: MODELS.settlement,
				data: {
					id: generateId(),
					referenceNumber: generateReference("STL", now),
					merchantId: merchant.id,
					transactionId: null,
					settlementType: "withdrawal",
					grossAmount: amount,
					commissionAmount: 0,
					netAmount: amount,
					currency: ctx.options.currency,
					status: "pending",
					bankName: bank.bankName,
					bankAccountNumber: bank.bankAccountNumber,
					iban: bank.iban ?? null,
					bankReference: null,
					failureReason: null,
					processedAt: null,
					completedAt: null,
					version: 1,
					createdAt: now,
					updatedAt: now,
				},
			}),
		);

		queueAfterTransactionHook(() => {
			ctx.logger.info("Withdrawal requested", {
				merchantId: merchant.id,
				settlementId: settlement.id,
				amount,
			});
		});
		return settlement;
	});
}

async function transition(
	ctx: InstaloContext,
	settlementId: string,
	event: SettlementEvent,
	changes: (now: Date) => Record<string, unknown>,
): Promise<Settlement> {
	const now = ctx.clock();
	// Lock order is merchant before settlement, so read the owner first.
	const snapshot = await getSettlement(ctx, settlementId);

	return withTransaction(ctx, async (tx) => {
		const merchant = await lockMerchant(tx, snapshot.merchantId);
		const settlement = await lockRow(tx, MODELS.settlement, settlementId, toSettlement, "Settlement");
		const status = nextSettlementStatus(settlement.status, event);

		const updated = await updateVersioned(tx, {
			model: MODELS.settlement,
			current: settlement,
			changes: { status, ...changes(now) },
			map: toSettlement,
			now,
		});

		if (status === "failed" && settlement.settlementType === "withdrawal") {
			await updateVersioned(tx, {
				model: MODELS.merchant,
				current: merchant,
				changes: { balance: merchant.balance + settlement.netAmount },
				map: toMerchant,
				now,
			});
		}

		queueAfterTransactionHook(() => {
			ctx.logger.info("Settlement status changed", {
				settlementId,
				merchantId: merchant.id,
				from: settlement.status,
				to: status,
			});
		});
		return updated;
	});
}

export function processSettlement(ctx: InstaloContext, settlementId: string): Promise<Settlement> {
	return transition(ctx, settlementId, "process", (now) => ({ processedAt: now }));
}

export async function completeSettlement(
	ctx: InstaloContext,
	params: { settlementId: string; bankReference?: string },
): Promise<Settlement> {
	const bankReference = optionalString(params.bankReference, "bankReference", { maxLength: 100 });
	return transition(ctx, params.settlementId, "complete", (now) => ({
		completedAt: now,
		bankReference,
	}));
}

export async function failSettlement(
	ctx: InstaloContext,
	params: { settlementId: string; reason: string },
): Promise<Settlement> {
	const failureReason = requireString(params.reason, "reason", { maxLength: 500 });
	return transition(ctx, params.settlementId, "fail", () => ({ failureReason }));
}

// =============================================================================
// READS
// =============================================================================

export function getSettlement(ctx: InstaloContext, settlementId: string): Promise<Settlement> {
	return findRow(ctx.adapter, MODELS.settlement, settlementId, toSettlement, "Settlement");
}

export async function listSettlements(
	ctx: InstaloContext,
	params: PaginationParams & {
		merchantId?: string;
		type?: SettlementType;
		status?: SettlementStatus;
	} = {},
): Promise<PaginatedResult<Settlement>> {
	const where: Where[] = [];
	if (params.merchantId !== undefined) {
		where.push({ field: "merchantId", operator: "eq", value: params.merchantId });
	}
	if (params.type !== undefined) {
		where.push({
			field: "settlementType",
			operator: "eq",
			value: requireOneOf(params.type, SETTLEMENT_TYPES, "type"),
		});
	}
	if (params.status !== undefined) {
		where.push({
			field: "status",
			operator: "eq",
			value: requireOneOf(params.status, SETTLEMENT_STATUSES, "status"),
		});
	}
	return listPage(ctx.adapter, {
		model: MODELS.settlement,
		where,
		pagination: params,
		map: toSettlement,
	});
}

/** Commission earned over completed income settlements, optionally within [from, to]. */
export async function getPlatformRevenue(
	ctx: InstaloContext,
	params: { from?: Date; to?: Date } = {},
): Promise<PlatformRevenue> {
	const where: Where[] = [
		{ field: "settlementType", operator: "eq", value: "income" },
		{ field: "status", operator: "eq", value: "completed" },
	];
	if (params.from) where.push({ field: "completedAt", operator: "gte", value: params.from });
	if (params.to) where.push({ field: "completedAt", operator: "lte", value: params.to });

	const model = MODELS.settlement;
	const [transactionCount, grossVolume, commission, netToMerchants] = await Promise.all([
		ctx.adapter.count({ model, where }),
		ctx.adapter.sum({ model, field: "grossAmount", where }),
		ctx.adapter.sum({ model, field: "commissionAmount", where }),
		ctx.adapter.sum({ model, field: "netAmount", where }),
	]);
	return { transactionCount, grossVolume, commission, netToMerchants };
}
