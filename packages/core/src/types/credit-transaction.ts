export const TRANSACTION_STATUSES = [
	"active",
	"completed",
	"overdue",
	"defaulted",
	"cancelled",
] as const;

export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

/** A purchase financed in installments. Created once per accepted request. */
export interface CreditTransaction {
	id: string;
	referenceNumber: string;
	purchaseRequestId: string;
	customerId: string;
	merchantId: string;
	productName: string;
	currency: string;
	totalAmount: number;
	/** Locked in at creation */
	commissionRatePpm: number;
	commissionAmount: number;
	netAmount: number;
	paidAmount: number;
	remainingBalance: number;
	status: TransactionStatus;
	/** Due date of the final installment */
	dueDate: Date;
	completedAt: Date | null;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface PlatformRevenue {
	transactionCount: number;
	grossVolume: number;
	commission: number;
	netToMerchants: number;
}
