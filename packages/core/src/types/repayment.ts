export const PLAN_STATUSES = ["active", "completed", "defaulted"] as const;
export type PlanStatus = (typeof PLAN_STATUSES)[number];

export const INSTALLMENT_STATUSES = ["pending", "paid", "overdue", "skipped"] as const;
export type InstallmentStatus = (typeof INSTALLMENT_STATUSES)[number];

export interface RepaymentPlan {
	id: string;
	referenceNumber: string;
	transactionId: string;
	/** Number of monthly installments */
	planType: number;
	totalAmount: number;
	/** Nominal installment; the last one absorbs the rounding remainder */
	installmentAmount: number;
	numberOfInstallments: number;
	installmentsPaid: number;
	amountPaid: number;
	remainingAmount: number;
	firstDueDate: Date;
	lastDueDate: Date;
	status: PlanStatus;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface Installment {
	id: string;
	planId: string;
	transactionId: string;
	installmentNumber: number;
	amount: number;
	dueDate: Date;
	status: InstallmentStatus;
	paidAmount: number;
	paidAt: Date | null;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}
