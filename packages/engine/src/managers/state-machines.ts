// =============================================================================
// STATE MACHINES
// =============================================================================
// One transition function per lifecycle. Each switch is exhaustive over the
// status union, so adding a status fails to compile until it is handled here.

import type {
	AccountStatus,
	InstallmentStatus,
	LimitRequestStatus,
	PlanStatus,
	PurchaseRequestStatus,
	SettlementStatus,
	TransactionStatus,
} from "@instalo/core";
import { InstaloError } from "@instalo/core";

function unhandled(value: never): never {
	throw InstaloError.internal(`Unhandled status: ${String(value)}`);
}

function rejectTransition(entity: string, from: string, event: string): never {
	throw InstaloError.invalidState(`Cannot ${event} a ${entity} that is ${from}`, {
		entity,
		from,
		event,
	});
}

// =============================================================================
// PURCHASE REQUEST
// =============================================================================

export type PurchaseRequestEvent = "accept" | "reject" | "cancel" | "expire";

export function nextPurchaseRequestStatus(
	current: PurchaseRequestStatus,
	event: PurchaseRequestEvent,
): PurchaseRequestStatus {
	switch (current) {
		case "pending":
			switch (event) {
				case "accept":
					return "accepted";
				case "reject":
					return "rejected";
				case "cancel":
					return "cancelled";
				case "expire":
					return "expired";
				default:
					return unhandled(event);
			}
		case "accepted":
		case "rejected":
		case "expired":
		case "cancelled":
			return rejectTransition("purchase request", current, event);
		default:
			return unhandled(current);
	}
}

// =============================================================================
// TRANSACTION
// =============================================================================

export type TransactionEvent =
	| { type: "payment"; remainingBalance: number; hasOverdueInstallments: boolean }
	| { type: "overdue" }
	| { type: "default" };

export function canAcceptPayments(status: TransactionStatus): boolean {
	switch (status) {
		case "active":
		case "overdue":
			return true;
		case "completed":
		case "defaulted":
		case "cancelled":
			return false;
		default:
			return unhandled(status);
	}
}

export function nextTransactionStatus(
	current: TransactionStatus,
	event: TransactionEvent,
): TransactionStatus {
	switch (current) {
		case "active":
		case "overdue":
			switch (event.type) {
				case "payment":
					if (event.remainingBalance === 0) return "completed";
					return event.hasOverdueInstallments ? "overdue" : "active";
				case "overdue":
					return "overdue";
				case "default":
					if (current === "overdue") return "defaulted";
					return rejectTransition("transaction", current, "default");
				default:
					return unhandled(event);
			}
		case "completed":
		case "defaulted":
		case "cancelled":
			if (event.type === "payment") {
				throw InstaloError.transactionNotActive(`Transaction is ${current}`);
			}
			return rejectTransition("transaction", current, event.type);
		default:
			return unhandled(current);
	}
}

// =============================================================================
// REPAYMENT PLAN
// =============================================================================

export type PlanEvent = { type: "payment"; remainingAmount: number } | { type: "default" };

export function nextPlanStatus(current: PlanStatus, event: PlanEvent): PlanStatus {
	switch (current) {
		case "active":
			if (event.type === "default") return "defaulted";
			return event.remainingAmount === 0 ? "completed" : "active";
		case "completed":
		case "defaulted":
			return rejectTransition("repayment plan", current, event.type);
		default:
			return unhandled(current);
	}
}

// =============================================================================
// INSTALLMENT
// =============================================================================

export type InstallmentEvent = { type: "payment"; fullyPaid: boolean } | { type: "overdue" };

export function nextInstallmentStatus(
	current: InstallmentStatus,
	event: InstallmentEvent,
): InstallmentStatus {
	switch (current) {
		case "pending":
		case "overdue":
			if (event.type === "overdue") return "overdue";
			return event.fullyPaid ? "paid" : current;
		case "paid":
		case "skipped":
			return rejectTransition("installment", current, event.type);
		default:
			return unhandled(current);
	}
}

// =============================================================================
// SETTLEMENT
// =============================================================================

export type SettlementEvent = "process" | "complete" | "fail";

export function nextSettlementStatus(
	current: SettlementStatus,
	event: SettlementEvent,
): SettlementStatus {
	switch (current) {
		case "pending":
			if (event === "process") return "processing";
			if (event === "fail") return "failed";
			return rejectTransition("settlement", current, event);
		case "processing":
			if (event === "complete") return "completed";
			if (event === "fail") return "failed";
			return rejectTransition("settlement", current, event);
		case "completed":
		case "failed":
			return rejectTransition("settlement", current, event);
		default:
			return unhandled(current);
	}
}

// =============================================================================
// ACCOUNT (customers and merchants)
// =============================================================================

export function nextAccountStatus(current: AccountStatus, target: AccountStatus): AccountStatus {
	switch (current) {
		case "active":
		case "suspended":
			if (target === current) {
				throw InstaloError.invalidState(`Account is already ${current}`, { from: current, target });
			}
			return target;
		case "blocked":
			throw InstaloError.invalidState("Blocked accounts cannot change status", {
				from: current,
				target,
			});
		default:
			return unhandled(current);
	}
}

// =============================================================================
// LIMIT REQUEST
// =============================================================================

export type LimitRequestEvent = "approve" | "reject";

export function nextLimitRequestStatus(
	current: LimitRequestStatus,
	event: LimitRequestEvent,
): LimitRequestStatus {
	switch (current) {
		case "pending":
			return event === "approve" ? "approved" : "rejected";
		case "approved":
		case "rejected":
			return rejectTransition("limit request", current, event);
		default:
			return unhandled(current);
	}
}
