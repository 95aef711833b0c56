export type { Instalo } from "./instalo/base.js";
export { createInstalo } from "./instalo/base.js";

export { defineInstaloConfig, validateConfig } from "./config/index.js";
export { buildContext, DEFAULT_PLAN_TYPES } from "./context/context.js";
export { isRetryableError, withTransaction } from "./infrastructure/transaction.js";

// Pure ledger rules
export { computeNet, type CommissionSplit } from "./managers/commission.js";
export {
	assertLedgerBalanced,
	type CreditBalances,
	raiseLimit,
	releaseCredit,
	reserveCredit,
} from "./managers/credit-ledger.js";
export {
	assertScheduleSum,
	firstDueDate,
	generateSchedule,
	type ScheduledInstallment,
} from "./managers/installment-plan.js";
export {
	type DistributionResult,
	distributePayment,
	hasOverdueInstallments,
	refreshOverdue,
	type RowAllocation,
} from "./managers/payment-distribution.js";
export { isExpired, presentRequest } from "./managers/purchase-request-manager.js";
export * from "./managers/state-machines.js";

// Result shapes
export type {
	AppliedPayment,
	InstallmentDue,
	PaymentWithAllocations,
} from "./managers/payment-manager.js";
export type { AcceptedPurchase } from "./managers/purchase-request-manager.js";
export { SWEEP_LOCK_KEY, type SweepResult } from "./managers/sweep.js";
export type { TransactionSchedule } from "./managers/transaction-manager.js";

export * from "@instalo/core";
