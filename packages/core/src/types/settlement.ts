export const SETTLEMENT_TYPES = ["income", "withdrawal"] as const;
export type SettlementType = (typeof SETTLEMENT_TYPES)[number];

export const SETTLEMENT_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export type SettlementStatus = (typeof SETTLEMENT_STATUSES)[number];

export interface Settlement {
	id: string;
	referenceNumber: string;
	merchantId: string;
	/** Set for income settlements */
	transactionId: string | null;
	settlementType: SettlementType;
	grossAmount: number;
	commissionAmount: number;
	netAmount: number;
	currency: string;
	status: SettlementStatus;
	bankName: string | null;
	bankAccountNumber: string | null;
	iban: string | null;
	bankReference: string | null;
	failureReason: string | null;
	processedAt: Date | null;
	completedAt: Date | null;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}
