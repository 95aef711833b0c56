import type { Installment } from "@instalo/core";
import { isInstaloError } from "@instalo/core";
import { describe, expect, it } from "vitest";
import {
	distributePayment,
	hasOverdueInstallments,
	refreshOverdue,
} from "../managers/payment-distribution.js";

const created = new Date("2025-01-15T10:00:00.000Z");

function row(
	installmentNumber: number,
	amount: number,
	dueDate: string,
	extra: Partial<Installment> = {},
): Installment {
	return {
		id: `row-${installmentNumber}`,
		planId: "plan-1",
		transactionId: "txn-1",
		installmentNumber,
		amount,
		dueDate: new Date(dueDate),
		status: "pending",
		paidAmount: 0,
		paidAt: null,
		version: 1,
		createdAt: created,
		updatedAt: created,
		...extra,
	};
}

const schedule = [
	row(1, 33333, "2025-02-15T10:00:00.000Z"),
	row(2, 33333, "2025-03-15T10:00:00.000Z"),
	row(3, 33334, "2025-04-15T10:00:00.000Z"),
];

describe("distributePayment", () => {
	const now = new Date("2025-02-01T00:00:00.000Z");

	it("pays the oldest row first", () => {
		const result = distributePayment(schedule, 33333, now);

		expect(result.allocations).toEqual([
			{ scheduleId: "row-1", installmentNumber: 1, amount: 33333 },
		]);
		expect(result.rows.map((r) => r.status)).toEqual(["paid", "pending", "pending"]);
		expect(result.rows[0]?.paidAt).toEqual(now);
		expect(result.changed).toHaveLength(1);
	});

	it("leaves a partially paid row open", () => {
		const result = distributePayment(schedule, 10000, now);

		expect(result.rows[0]).toMatchObject({ status: "pending", paidAmount: 10000, paidAt: null });
	});

	it("spills into later rows", () => {
		const result = distributePayment(schedule, 50000, now);

		expect(result.allocations.map((a) => a.amount)).toEqual([33333, 16667]);
		expect(result.rows.map((r) => r.paidAmount)).toEqual([33333, 16667, 0]);
		expect(result.rows.map((r) => r.status)).toEqual(["paid", "pending", "pending"]);
	});

	it("settles every row on a full payoff", () => {
		const result = distributePayment(schedule, 100000, now);

		expect(result.rows.every((r) => r.status === "paid")).toBe(true);
		expect(result.allocations.reduce((acc, a) => acc + a.amount, 0)).toBe(100000);
	});

	it("orders rows by installment number whatever the input order", () => {
		const shuffled = [schedule[2], schedule[0], schedule[1]].filter(
			(r): r is Installment => r !== undefined,
		);
		const result = distributePayment(shuffled, 1, now);

		expect(result.allocations[0]?.installmentNumber).toBe(1);
		expect(result.rows.map((r) => r.installmentNumber)).toEqual([1, 2, 3]);
	});

	it("skips paid rows", () => {
		const partlyPaid = [
			row(1, 100, "2025-02-15T10:00:00.000Z", { status: "paid", paidAmount: 100 }),
			row(2, 100, "2025-03-15T10:00:00.000Z", { paidAmount: 40 }),
			row(3, 100, "2025-04-15T10:00:00.000Z"),
		];
		const result = distributePayment(partlyPaid, 80, now);

		expect(result.allocations).toEqual([
			{ scheduleId: "row-2", installmentNumber: 2, amount: 60 },
			{ scheduleId: "row-3", installmentNumber: 3, amount: 20 },
		]);
	});

	it("rejects overpayment", () => {
		let code: string | undefined;
		try {
			distributePayment(schedule, 100001, now);
		} catch (err) {
			code = isInstaloError(err) ? err.code : undefined;
		}
		expect(code).toBe("INVALID_AMOUNT");
	});

	it("rejects zero", () => {
		expect(() => distributePayment(schedule, 0, now)).toThrow(
			"Payment amount must be a positive integer",
		);
	});
});

describe("refreshOverdue", () => {
	it("marks pending rows past their due date", () => {
		const refreshed = refreshOverdue(schedule, new Date("2025-03-20T00:00:00.000Z"));

		expect(refreshed.map((r) => r.status)).toEqual(["overdue", "overdue", "pending"]);
		expect(hasOverdueInstallments(refreshed)).toBe(true);
	});

	it("does not mark a row due at this exact instant", () => {
		const refreshed = refreshOverdue(schedule, new Date("2025-02-15T10:00:00.000Z"));

		expect(refreshed.map((r) => r.status)).toEqual(["pending", "pending", "pending"]);
		expect(hasOverdueInstallments(refreshed)).toBe(false);
	});

	it("keeps paid rows paid", () => {
		const paid = [row(1, 100, "2025-02-15T10:00:00.000Z", { status: "paid", paidAmount: 100 })];

		expect(refreshOverdue(paid, new Date("2026-01-01T00:00:00.000Z"))[0]?.status).toBe("paid");
	});

	it("lets a payment clear an overdue row", () => {
		const now = new Date("2025-02-20T00:00:00.000Z");
		const result = distributePayment(refreshOverdue(schedule, now), 33333, now);

		expect(result.rows.map((r) => r.status)).toEqual(["paid", "pending", "pending"]);
		expect(hasOverdueInstallments(result.rows)).toBe(false);
	});
});
