// =============================================================================
// CUSTOMER MANAGER -- Registration, status and credit views
// =============================================================================

import type {
	AccountStatus,
	CreditSummary,
	Customer,
	CustomerPaymentStats,
	InstaloContext,
	PaginatedResult,
	PaginationParams,
} from "@instalo/core";
import {
	ACCOUNT_STATUSES,
	generateCustomerCode,
	generateId,
	InstaloError,
	optionalString,
	PPM,
	requireOneOf,
	requireString,
} from "@instalo/core";
import { MODELS, queueAfterTransactionHook, type Where } from "@instalo/core/db";
import { withTransaction } from "../infrastructure/transaction.js";
import { assertLedgerBalanced, lockCustomer } from "./credit-ledger.js";
import { listPage } from "./paging.js";
import { refreshOverdue, rowRemaining } from "./payment-distribution.js";
import { toCustomer, toInstallment, toTransaction } from "./rows.js";
import { nextAccountStatus } from "./state-machines.js";
import { findRow, updateVersioned } from "./versioned.js";

const CODE_ATTEMPTS = 5;

// =============================================================================
// CREATE
// =============================================================================

export async function createCustomer(
	ctx: InstaloContext,
	params: { userId?: string; creditLimit?: number } = {},
): Promise<Customer> {
	const { defaultCreditLimit, maxCreditLimit } = ctx.options.creditPolicy;
	const userId = optionalString(params.userId, "userId", { maxLength: 255 });
	const creditLimit = params.creditLimit ?? defaultCreditLimit;

	if (!Number.isSafeInteger(creditLimit) || creditLimit <= 0) {
		throw InstaloError.validation("creditLimit must be a positive integer in minor units", {
			creditLimit,
		});
	}
	if (creditLimit > maxCreditLimit) {
		throw InstaloError.limitExceedsMax(undefined, { creditLimit, maxCreditLimit });
	}

	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		let customerCode: string | null = null;
		for (let i = 0; i < CODE_ATTEMPTS && customerCode === null; i++) {
			const candidate = generateCustomerCode();
			const taken = await tx.findOne({
				model: MODELS.customer,
				where: [{ field: "customerCode", operator: "eq", value: candidate }],
			});
			if (!taken) customerCode = candidate;
		}
		if (customerCode === null) {
			throw InstaloError.internal("Could not allocate a unique customer code");
		}

		const balances = {
			creditLimit,
			availableBalance: creditLimit,
			outstandingBalance: 0,
		};
		assertLedgerBalanced(balances);

		const row = await tx.create({
			model: MODELS.customer,
			data: {
				id: generateId(),
				userId,
				customerCode,
				...balances,
				status: "active",
				version: 1,
				createdAt: now,
				updatedAt: now,
			},
		});
		const customer = toCustomer(row);

		queueAfterTransactionHook(() => {
			ctx.logger.info("Customer created", {
				customerId: customer.id,
				customerCode: customer.customerCode,
				creditLimit,
			});
		});
		return customer;
	});
}

// =============================================================================
// READ
// =============================================================================

export function getCustomer(ctx: InstaloContext, customerId: string): Promise<Customer> {
	return findRow(ctx.adapter, MODELS.customer, customerId, toCustomer, "Customer");
}

export async function getCustomerByCode(ctx: InstaloContext, code: string): Promise<Customer> {
	const customerCode = requireString(code, "customerCode").toUpperCase();
	const row = await ctx.adapter.findOne({
		model: MODELS.customer,
		where: [{ field: "customerCode", operator: "eq", value: customerCode }],
	});
	if (!row) throw InstaloError.notFound(`Customer with code ${customerCode} not found`);
	return toCustomer(row);
}

export async function listCustomers(
	ctx: InstaloContext,
	params: PaginationParams & { status?: AccountStatus } = {},
): Promise<PaginatedResult<Customer>> {
	const where: Where[] = [];
	if (params.status !== undefined) {
		where.push({
			field: "status",
			operator: "eq",
			value: requireOneOf(params.status, ACCOUNT_STATUSES, "status"),
		});
	}
	return listPage(ctx.adapter, {
		model: MODELS.customer,
		where,
		pagination: params,
		map: toCustomer,
	});
}

export async function getCreditSummary(
	ctx: InstaloContext,
	customerId: string,
): Promise<CreditSummary> {
	const customer = await getCustomer(ctx, customerId);
	return {
		creditLimit: customer.creditLimit,
		availableBalance: customer.availableBalance,
		outstandingBalance: customer.outstandingBalance,
		utilizationPpm:
			customer.creditLimit > 0
				? Math.round((customer.outstandingBalance * PPM) / customer.creditLimit)
				: 0,
	};
}

/** Punctuality over paid installments plus what is overdue right now. */
export async function getPaymentStats(
	ctx: InstaloContext,
	customerId: string,
	options: { now?: Date } = {},
): Promise<CustomerPaymentStats> {
	await getCustomer(ctx, customerId);
	const now = options.now ?? ctx.clock();

	const transactions = (
		await ctx.adapter.findMany({
			model: MODELS.transaction,
			where: [{ field: "customerId", operator: "eq", value: customerId }],
		})
	).map(toTransaction);

	const rows =
		transactions.length === 0
			? []
			: refreshOverdue(
					(
						await ctx.adapter.findMany({
							model: MODELS.schedule,
							where: [
								{ field: "transactionId", operator: "in", value: transactions.map((t) => t.id) },
							],
						})
					).map(toInstallment),
					now,
				);

	const paid = rows.filter((row) => row.status === "paid");
	const paidLate = paid.filter(
		(row) => row.paidAt !== null && row.paidAt.getTime() > row.dueDate.getTime(),
	).length;
	const overdue = rows.filter((row) => row.status === "overdue");

	return {
		customerId,
		paidInstallments: paid.length,
		paidOnTime: paid.length - paidLate,
		paidLate,
		overdueInstallments: overdue.length,
		overdueAmount: overdue.reduce((acc, row) => acc + rowRemaining(row), 0),
		onTimeRate: paid.length === 0 ? 1 : (paid.length - paidLate) / paid.length,
	};
}

// =============================================================================
// STATUS
// =============================================================================

export async function setCustomerStatus(
	ctx: InstaloContext,
	params: { customerId: string; status: AccountStatus },
): Promise<Customer> {
	const target = requireOneOf(params.status, ACCOUNT_STATUSES, "status");
	const now = ctx.clock();

	return withTransaction(ctx, async (tx) => {
		const customer = await lockCustomer(tx, params.customerId);
		const status = nextAccountStatus(customer.status, target);
		const updated = await updateVersioned(tx, {
			model: MODELS.customer,
			current: customer,
			changes: { status },
			map: toCustomer,
			now,
		});
		queueAfterTransactionHook(() => {
			ctx.logger.info("Customer status changed", {
				customerId: customer.id,
				from: customer.status,
				to: status,
			});
		});
		return updated;
	});
}
