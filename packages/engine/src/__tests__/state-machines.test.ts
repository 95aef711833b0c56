import { InstaloError } from "@instalo/core";
import { describe, expect, it } from "vitest";
import {
	canAcceptPayments,
	nextAccountStatus,
	nextInstallmentStatus,
	nextLimitRequestStatus,
	nextPlanStatus,
	nextPurchaseRequestStatus,
	nextSettlementStatus,
	nextTransactionStatus,
} from "../managers/state-machines.js";

describe("purchase request transitions", () => {
	it("moves pending to each outcome", () => {
		expect(nextPurchaseRequestStatus("pending", "accept")).toBe("accepted");
		expect(nextPurchaseRequestStatus("pending", "reject")).toBe("rejected");
		expect(nextPurchaseRequestStatus("pending", "cancel")).toBe("cancelled");
		expect(nextPurchaseRequestStatus("pending", "expire")).toBe("expired");
	});

	it("treats every outcome as terminal", () => {
		for (const status of ["accepted", "rejected", "expired", "cancelled"] as const) {
			expect(() => nextPurchaseRequestStatus(status, "accept")).toThrow(InstaloError);
		}
		expect(() => nextPurchaseRequestStatus("accepted", "reject")).toThrow(
			"Cannot reject a purchase request that is accepted",
		);
	});
});

describe("transaction transitions", () => {
	it("completes when the balance reaches zero", () => {
		expect(
			nextTransactionStatus("overdue", {
				type: "payment",
				remainingBalance: 0,
				hasOverdueInstallments: false,
			}),
		).toBe("completed");
	});

	it("stays overdue while a lapsed row remains", () => {
		expect(
			nextTransactionStatus("overdue", {
				type: "payment",
				remainingBalance: 500,
				hasOverdueInstallments: true,
			}),
		).toBe("overdue");
		expect(
			nextTransactionStatus("overdue", {
				type: "payment",
				remainingBalance: 500,
				hasOverdueInstallments: false,
			}),
		).toBe("active");
	});

	it("defaults only from overdue", () => {
		expect(nextTransactionStatus("overdue", { type: "default" })).toBe("defaulted");
		expect(() => nextTransactionStatus("active", { type: "default" })).toThrow(
			"Cannot default a transaction that is active",
		);
	});

	it("refuses payments on closed transactions", () => {
		for (const status of ["completed", "defaulted", "cancelled"] as const) {
			expect(canAcceptPayments(status)).toBe(false);
			expect(() =>
				nextTransactionStatus(status, {
					type: "payment",
					remainingBalance: 0,
					hasOverdueInstallments: false,
				}),
			).toThrow(`Transaction is ${status}`);
		}
		expect(canAcceptPayments("active")).toBe(true);
		expect(canAcceptPayments("overdue")).toBe(true);
	});
});

describe("plan and installment transitions", () => {
	it("completes a plan at zero remaining", () => {
		expect(nextPlanStatus("active", { type: "payment", remainingAmount: 0 })).toBe("completed");
		expect(nextPlanStatus("active", { type: "payment", remainingAmount: 1 })).toBe("active");
		expect(nextPlanStatus("active", { type: "default" })).toBe("defaulted");
		expect(() => nextPlanStatus("completed", { type: "default" })).toThrow(InstaloError);
	});

	it("keeps a partially paid installment in its current status", () => {
		expect(nextInstallmentStatus("overdue", { type: "payment", fullyPaid: false })).toBe("overdue");
		expect(nextInstallmentStatus("pending", { type: "payment", fullyPaid: true })).toBe("paid");
		expect(() => nextInstallmentStatus("paid", { type: "overdue" })).toThrow(InstaloError);
	});
});

describe("settlement transitions", () => {
	it("runs pending -> processing -> completed", () => {
		expect(nextSettlementStatus("pending", "process")).toBe("processing");
		expect(nextSettlementStatus("processing", "complete")).toBe("completed");
	});

	it("fails from pending or processing only", () => {
		expect(nextSettlementStatus("pending", "fail")).toBe("failed");
		expect(nextSettlementStatus("processing", "fail")).toBe("failed");
		expect(() => nextSettlementStatus("completed", "fail")).toThrow(
			"Cannot fail a settlement that is completed",
		);
	});

	it("cannot complete without processing first", () => {
		expect(() => nextSettlementStatus("pending", "complete")).toThrow(InstaloError);
	});
});

describe("account and limit transitions", () => {
	it("toggles between active and suspended", () => {
		expect(nextAccountStatus("active", "suspended")).toBe("suspended");
		expect(nextAccountStatus("suspended", "active")).toBe("active");
		expect(nextAccountStatus("active", "blocked")).toBe("blocked");
	});

	it("rejects no-op and blocked transitions", () => {
		expect(() => nextAccountStatus("active", "active")).toThrow("Account is already active");
		expect(() => nextAccountStatus("blocked", "active")).toThrow(
			"Blocked accounts cannot change status",
		);
	});

	it("decides a limit request once", () => {
		expect(nextLimitRequestStatus("pending", "approve")).toBe("approved");
		expect(nextLimitRequestStatus("pending", "reject")).toBe("rejected");
		expect(() => nextLimitRequestStatus("approved", "reject")).toThrow(InstaloError);
	});
});
