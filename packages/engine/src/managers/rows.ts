// =============================================================================
// ROW READERS
// =============================================================================
// Adapters hand back camelCase records of unknown shape. PostgreSQL returns
// bigint columns as strings and timestamps as Date; the memory adapter returns
// whatever was stored. These readers turn either form into domain objects.

import type {
	AccountStatus,
	CreditTransaction,
	Customer,
	CustomerLimitHistory,
	Installment,
	Merchant,
	Payment,
	PaymentAllocation,
	PurchaseRequest,
	RepaymentPlan,
	Settlement,
} from "@instalo/core";
import {
	ACCOUNT_STATUSES,
	INSTALLMENT_STATUSES,
	InstaloError,
	LIMIT_REQUEST_STATUSES,
	PAYMENT_METHODS,
	PAYMENT_STATUSES,
	PLAN_STATUSES,
	PURCHASE_REQUEST_STATUSES,
	SETTLEMENT_STATUSES,
	SETTLEMENT_TYPES,
	TRANSACTION_STATUSES,
} from "@instalo/core";
import type { Row } from "@instalo/core/db";

function malformed(key: string, value: unknown): InstaloError {
	return InstaloError.internal(`Column "${key}" holds an unexpected value: ${String(value)}`);
}

export function readString(row: Row, key: string): string {
	const value = row[key];
	if (typeof value !== "string") throw malformed(key, value);
	return value;
}

export function readNullableString(row: Row, key: string): string | null {
	const value = row[key];
	if (value === null || value === undefined) return null;
	if (typeof value !== "string") throw malformed(key, value);
	return value;
}

/** Integer column; accepts the string form pg uses for bigint. */
export function readInteger(row: Row, key: string): number {
	const value = row[key];
	const parsed = typeof value === "string" && /^-?\d+$/.test(value) ? Number(value) : value;
	if (typeof parsed !== "number" || !Number.isSafeInteger(parsed)) throw malformed(key, value);
	return parsed;
}

export function readDate(row: Row, key: string): Date {
	const value = row[key];
	const date =
		value instanceof Date
			? value
			: typeof value === "string" || typeof value === "number"
				? new Date(value)
				: null;
	if (!date || Number.isNaN(date.getTime())) throw malformed(key, value);
	return date;
}

export function readNullableDate(row: Row, key: string): Date | null {
	const value = row[key];
	if (value === null || value === undefined) return null;
	return readDate(row, key);
}

export function readEnum<T extends string>(row: Row, key: string, allowed: readonly T[]): T {
	const value = row[key];
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) throw malformed(key, value);
	return match;
}

// =============================================================================
// DOMAIN MAPPERS
// =============================================================================

export function toCustomer(row: Row): Customer {
	return {
		id: readString(row, "id"),
		userId: readNullableString(row, "userId"),
		customerCode: readString(row, "customerCode"),
		creditLimit: readInteger(row, "creditLimit"),
		availableBalance: readInteger(row, "availableBalance"),
		outstandingBalance: readInteger(row, "outstandingBalance"),
		status: readEnum<AccountStatus>(row, "status", ACCOUNT_STATUSES),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toMerchant(row: Row): Merchant {
	return {
		id: readString(row, "id"),
		userId: readNullableString(row, "userId"),
		shopName: readString(row, "shopName"),
		status: readEnum(row, "status", ACCOUNT_STATUSES),
		balance: readInteger(row, "balance"),
		totalTransactions: readInteger(row, "totalTransactions"),
		totalVolume: readInteger(row, "totalVolume"),
		totalCommissionPaid: readInteger(row, "totalCommissionPaid"),
		bankName: readNullableString(row, "bankName"),
		bankAccountNumber: readNullableString(row, "bankAccountNumber"),
		iban: readNullableString(row, "iban"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toPurchaseRequest(row: Row): PurchaseRequest {
	return {
		id: readString(row, "id"),
		referenceNumber: readString(row, "referenceNumber"),
		merchantId: readString(row, "merchantId"),
		customerId: readString(row, "customerId"),
		productName: readString(row, "productName"),
		description: readNullableString(row, "description"),
		quantity: readInteger(row, "quantity"),
		unitPrice: readInteger(row, "unitPrice"),
		totalAmount: readInteger(row, "totalAmount"),
		currency: readString(row, "currency"),
		status: readEnum(row, "status", PURCHASE_REQUEST_STATUSES),
		expiresAt: readDate(row, "expiresAt"),
		rejectionReason: readNullableString(row, "rejectionReason"),
		respondedAt: readNullableDate(row, "respondedAt"),
		transactionId: readNullableString(row, "transactionId"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toTransaction(row: Row): CreditTransaction {
	return {
		id: readString(row, "id"),
		referenceNumber: readString(row, "referenceNumber"),
		purchaseRequestId: readString(row, "purchaseRequestId"),
		customerId: readString(row, "customerId"),
		merchantId: readString(row, "merchantId"),
		productName: readString(row, "productName"),
		currency: readString(row, "currency"),
		totalAmount: readInteger(row, "totalAmount"),
		commissionRatePpm: readInteger(row, "commissionRatePpm"),
		commissionAmount: readInteger(row, "commissionAmount"),
		netAmount: readInteger(row, "netAmount"),
		paidAmount: readInteger(row, "paidAmount"),
		remainingBalance: readInteger(row, "remainingBalance"),
		status: readEnum(row, "status", TRANSACTION_STATUSES),
		dueDate: readDate(row, "dueDate"),
		completedAt: readNullableDate(row, "completedAt"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toPlan(row: Row): RepaymentPlan {
	return {
		id: readString(row, "id"),
		referenceNumber: readString(row, "referenceNumber"),
		transactionId: readString(row, "transactionId"),
		planType: readInteger(row, "planType"),
		totalAmount: readInteger(row, "totalAmount"),
		installmentAmount: readInteger(row, "installmentAmount"),
		numberOfInstallments: readInteger(row, "numberOfInstallments"),
		installmentsPaid: readInteger(row, "installmentsPaid"),
		amountPaid: readInteger(row, "amountPaid"),
		remainingAmount: readInteger(row, "remainingAmount"),
		firstDueDate: readDate(row, "firstDueDate"),
		lastDueDate: readDate(row, "lastDueDate"),
		status: readEnum(row, "status", PLAN_STATUSES),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toInstallment(row: Row): Installment {
	return {
		id: readString(row, "id"),
		planId: readString(row, "planId"),
		transactionId: readString(row, "transactionId"),
		installmentNumber: readInteger(row, "installmentNumber"),
		amount: readInteger(row, "amount"),
		dueDate: readDate(row, "dueDate"),
		status: readEnum(row, "status", INSTALLMENT_STATUSES),
		paidAmount: readInteger(row, "paidAmount"),
		paidAt: readNullableDate(row, "paidAt"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toPayment(row: Row): Payment {
	return {
		id: readString(row, "id"),
		referenceNumber: readString(row, "referenceNumber"),
		transactionId: readString(row, "transactionId"),
		customerId: readString(row, "customerId"),
		amount: readInteger(row, "amount"),
		currency: readString(row, "currency"),
		paymentMethod: readEnum(row, "paymentMethod", PAYMENT_METHODS),
		status: readEnum(row, "status", PAYMENT_STATUSES),
		createdAt: readDate(row, "createdAt"),
	};
}

export function toAllocation(row: Row): PaymentAllocation {
	return {
		id: readString(row, "id"),
		paymentId: readString(row, "paymentId"),
		scheduleId: readString(row, "scheduleId"),
		installmentNumber: readInteger(row, "installmentNumber"),
		amount: readInteger(row, "amount"),
		createdAt: readDate(row, "createdAt"),
	};
}

export function toSettlement(row: Row): Settlement {
	return {
		id: readString(row, "id"),
		referenceNumber: readString(row, "referenceNumber"),
		merchantId: readString(row, "merchantId"),
		transactionId: readNullableString(row, "transactionId"),
		settlementType: readEnum(row, "settlementType", SETTLEMENT_TYPES),
		grossAmount: readInteger(row, "grossAmount"),
		commissionAmount: readInteger(row, "commissionAmount"),
		netAmount: readInteger(row, "netAmount"),
		currency: readString(row, "currency"),
		status: readEnum(row, "status", SETTLEMENT_STATUSES),
		bankName: readNullableString(row, "bankName"),
		bankAccountNumber: readNullableString(row, "bankAccountNumber"),
		iban: readNullableString(row, "iban"),
		bankReference: readNullableString(row, "bankReference"),
		failureReason: readNullableString(row, "failureReason"),
		processedAt: readNullableDate(row, "processedAt"),
		completedAt: readNullableDate(row, "completedAt"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
		updatedAt: readDate(row, "updatedAt"),
	};
}

export function toLimitHistory(row: Row): CustomerLimitHistory {
	return {
		id: readString(row, "id"),
		customerId: readString(row, "customerId"),
		previousLimit: readInteger(row, "previousLimit"),
		requestedLimit: readInteger(row, "requestedLimit"),
		reason: readNullableString(row, "reason"),
		status: readEnum(row, "status", LIMIT_REQUEST_STATUSES),
		decidedBy: readNullableString(row, "decidedBy"),
		decisionReason: readNullableString(row, "decisionReason"),
		decidedAt: readNullableDate(row, "decidedAt"),
		version: readInteger(row, "version"),
		createdAt: readDate(row, "createdAt"),
	};
}
