export const ACCOUNT_STATUSES = ["active", "suspended", "blocked"] as const;

/** Shared by customers and merchants. `blocked` is terminal. */
export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

export interface BankDetails {
	bankName: string;
	bankAccountNumber: string;
	iban?: string | null;
}

export interface Customer {
	id: string;
	userId: string | null;
	/** Code the customer gives a merchant at checkout */
	customerCode: string;
	creditLimit: number;
	availableBalance: number;
	outstandingBalance: number;
	status: AccountStatus;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface CreditSummary {
	creditLimit: number;
	availableBalance: number;
	outstandingBalance: number;
	/** outstanding / limit, in parts per million */
	utilizationPpm: number;
}

export interface CustomerPaymentStats {
	customerId: string;
	paidInstallments: number;
	paidOnTime: number;
	paidLate: number;
	overdueInstallments: number;
	overdueAmount: number;
	/** paidOnTime / paidInstallments in [0, 1]; 1 when nothing has been paid */
	onTimeRate: number;
}

export interface Merchant {
	id: string;
	userId: string | null;
	shopName: string;
	status: AccountStatus;
	/** Withdrawable balance */
	balance: number;
	totalTransactions: number;
	totalVolume: number;
	totalCommissionPaid: number;
	bankName: string | null;
	bankAccountNumber: string | null;
	iban: string | null;
	version: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface MerchantStats {
	merchantId: string;
	balance: number;
	totalTransactions: number;
	totalVolume: number;
	totalCommissionPaid: number;
	requests: Record<"pending" | "accepted" | "rejected" | "expired" | "cancelled", number>;
	pendingWithdrawals: number;
	pendingWithdrawalAmount: number;
}
