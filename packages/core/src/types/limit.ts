export const LIMIT_REQUEST_STATUSES = ["pending", "approved", "rejected"] as const;
export type LimitRequestStatus = (typeof LIMIT_REQUEST_STATUSES)[number];

/** Approval record for a credit limit increase. */
export interface CustomerLimitHistory {
	id: string;
	customerId: string;
	previousLimit: number;
	requestedLimit: number;
	reason: string | null;
	status: LimitRequestStatus;
	/** Admin id, or "auto" for threshold approvals */
	decidedBy: string | null;
	decisionReason: string | null;
	decidedAt: Date | null;
	version: number;
	createdAt: Date;
}
