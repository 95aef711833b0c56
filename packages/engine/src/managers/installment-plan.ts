// =============================================================================
// INSTALLMENT PLAN GENERATOR
// =============================================================================
// Splits a transaction total into equal monthly installments. Every row gets
// floor(total / n); the last row absorbs the remainder, so the rows always sum
// to the total exactly. A total smaller than n leaves zero-amount rows ahead of
// the last one; those are settled as soon as the plan exists.

import { addCalendarDays, addCalendarMonths, InstaloError, isMinorUnits } from "@instalo/core";

export interface ScheduledInstallment {
	installmentNumber: number;
	amount: number;
	dueDate: Date;
}

export function generateSchedule(params: {
	totalAmount: number;
	planType: number;
	firstDueDate: Date;
}): ScheduledInstallment[] {
	const { totalAmount, planType, firstDueDate } = params;

	if (!Number.isSafeInteger(planType) || planType < 1) {
		throw InstaloError.validation("planType must be a positive integer", { planType });
	}
	if (!isMinorUnits(totalAmount) || totalAmount === 0) {
		throw InstaloError.invalidAmount("totalAmount must be a positive integer of minor units", {
			totalAmount,
			planType,
		});
	}

	const baseAmount = Math.floor(totalAmount / planType);
	const lastAmount = totalAmount - (planType - 1) * baseAmount;

	return Array.from({ length: planType }, (_, i) => ({
		installmentNumber: i + 1,
		amount: i === planType - 1 ? lastAmount : baseAmount,
		// Offsets are taken from the first due date, so a 31st keeps coming
		// back after a short month.
		dueDate: addCalendarMonths(firstDueDate, i),
	}));
}

/**
 * Pay-in-full plans fall due after a short grace period; monthly plans one
 * calendar month after acceptance.
 */
export function firstDueDate(
	acceptedAt: Date,
	planType: number,
	options: { payInFullGraceDays: number },
): Date {
	if (planType === 1) return addCalendarDays(acceptedAt, options.payInFullGraceDays);
	return addCalendarMonths(acceptedAt, 1);
}

export function assertScheduleSum(
	schedule: readonly { amount: number }[],
	totalAmount: number,
): void {
	const sum = schedule.reduce((acc, row) => acc + row.amount, 0);
	if (sum !== totalAmount) {
		throw InstaloError.invariantViolation("Schedule does not sum to the transaction total", {
			sum,
			totalAmount,
		});
	}
}
