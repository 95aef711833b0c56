export const PAYMENT_STATUSES = ["pending", "completed", "failed", "refunded"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_METHODS = ["wallet", "card", "bank_transfer"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/** Append-only record of money received against a transaction. */
export interface Payment {
	id: string;
	referenceNumber: string;
	transactionId: string;
	customerId: string;
	amount: number;
	currency: string;
	paymentMethod: PaymentMethod;
	status: PaymentStatus;
	createdAt: Date;
}

/** Portion of a payment applied to one schedule row. */
export interface PaymentAllocation {
	id: string;
	paymentId: string;
	scheduleId: string;
	installmentNumber: number;
	amount: number;
	createdAt: Date;
}
