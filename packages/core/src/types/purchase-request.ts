export const PURCHASE_REQUEST_STATUSES = [
	"pending",
	"accepted",
	"rejected",
	"expired",
	"cancelled",
] as const;

export type PurchaseRequestStatus = (typeof PURCHASE_REQUEST_STATUSES)[number];

export interface PurchaseRequest {
	id: string;
	referenceNumber: string;
	merchantId: string;
	customerId: string;
	productName: string;
	description: string | null;
	quantity: number;
	unitPrice: number;
	totalAmount: number;
	currency: string;
	status: PurchaseRequestStatus;
	expiresAt: Date;
	rejectionReason: string | null;
	respondedAt: Date | null;
	transactionId: string | null;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}
