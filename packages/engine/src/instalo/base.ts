// =============================================================================
// INSTALO -- Main entry point
// =============================================================================
// Creates the Instalo instance that exposes the full ledger API.

import type {
	AccountStatus,
	BankDetails,
	CreditSummary,
	CreditTransaction,
	Customer,
	CustomerLimitHistory,
	CustomerPaymentStats,
	InstaloContext,
	InstaloOptions,
	Merchant,
	MerchantStats,
	PaginatedResult,
	PaginationParams,
	Payment,
	PaymentMethod,
	PlatformRevenue,
	PurchaseRequest,
	PurchaseRequestStatus,
	Settlement,
	SettlementStatus,
	SettlementType,
	TransactionStatus,
} from "@instalo/core";
import { buildContext } from "../context/context.js";
import * as customers from "../managers/customer-manager.js";
import * as limits from "../managers/limit-manager.js";
import * as merchants from "../managers/merchant-manager.js";
import * as payments from "../managers/payment-manager.js";
import type {
	AppliedPayment,
	InstallmentDue,
	PaymentWithAllocations,
} from "../managers/payment-manager.js";
import * as requests from "../managers/purchase-request-manager.js";
import type { AcceptedPurchase } from "../managers/purchase-request-manager.js";
import * as settlements from "../managers/settlement-manager.js";
import { runSweep, type SweepResult } from "../managers/sweep.js";
import * as transactions from "../managers/transaction-manager.js";
import type { TransactionSchedule } from "../managers/transaction-manager.js";

// =============================================================================
// INSTALO INTERFACE
// =============================================================================

export interface Instalo {
	customers: {
		create: (params?: { userId?: string; creditLimit?: number }) => Promise<Customer>;
		get: (customerId: string) => Promise<Customer>;
		getByCode: (customerCode: string) => Promise<Customer>;
		list: (
			params?: PaginationParams & { status?: AccountStatus },
		) => Promise<PaginatedResult<Customer>>;
		getCredit: (customerId: string) => Promise<CreditSummary>;
		setStatus: (params: { customerId: string; status: AccountStatus }) => Promise<Customer>;
		paymentStats: (customerId: string, options?: { now?: Date }) => Promise<CustomerPaymentStats>;
	};
	merchants: {
		create: (params: {
			userId?: string;
			shopName: string;
			bankDetails?: BankDetails;
		}) => Promise<Merchant>;
		get: (merchantId: string) => Promise<Merchant>;
		list: (
			params?: PaginationParams & { status?: AccountStatus },
		) => Promise<PaginatedResult<Merchant>>;
		setStatus: (params: { merchantId: string; status: AccountStatus }) => Promise<Merchant>;
		stats: (merchantId: string, options?: { now?: Date }) => Promise<MerchantStats>;
	};
	purchaseRequests: {
		send: (params: {
			merchantId: string;
			customerId?: string;
			customerCode?: string;
			productName: string;
			quantity: number;
			unitPrice: number;
			description?: string;
		}) => Promise<PurchaseRequest>;
		get: (requestId: string, options?: { now?: Date }) => Promise<PurchaseRequest>;
		list: (
			params?: PaginationParams & {
				merchantId?: string;
				customerId?: string;
				status?: PurchaseRequestStatus;
				now?: Date;
			},
		) => Promise<PaginatedResult<PurchaseRequest>>;
		accept: (params: {
			requestId: string;
			planType: number;
			customerId?: string;
		}) => Promise<AcceptedPurchase>;
		reject: (params: {
			requestId: string;
			reason?: string;
			customerId?: string;
		}) => Promise<PurchaseRequest>;
		cancel: (params: { requestId: string; merchantId?: string }) => Promise<PurchaseRequest>;
		expireStale: (options?: { now?: Date }) => Promise<{ expired: number }>;
	};
	transactions: {
		get: (transactionId: string, options?: { now?: Date }) => Promise<CreditTransaction>;
		list: (
			params?: PaginationParams & {
				customerId?: string;
				merchantId?: string;
				status?: TransactionStatus;
				now?: Date;
			},
		) => Promise<PaginatedResult<CreditTransaction>>;
		schedule: (transactionId: string, options?: { now?: Date }) => Promise<TransactionSchedule>;
		markOverdue: (options?: { now?: Date }) => Promise<{ transactions: number; installments: number }>;
		markDefaulted: (params: { transactionId: string }) => Promise<TransactionSchedule>;
	};
	payments: {
		make: (params: {
			transactionId: string;
			amount: number;
			paymentMethod?: PaymentMethod;
			customerId?: string;
		}) => Promise<AppliedPayment>;
		get: (paymentId: string) => Promise<PaymentWithAllocations>;
		list: (
			params?: PaginationParams & { transactionId?: string; customerId?: string },
		) => Promise<PaginatedResult<Payment>>;
		upcoming: (params: {
			customerId: string;
			withinDays?: number;
			now?: Date;
		}) => Promise<InstallmentDue[]>;
		overdue: (params?: { customerId?: string; now?: Date }) => Promise<InstallmentDue[]>;
	};
	settlements: {
		requestWithdrawal: (params: {
			merchantId: string;
			amount: number;
			bankDetails: BankDetails;
		}) => Promise<Settlement>;
		process: (settlementId: string) => Promise<Settlement>;
		complete: (params: { settlementId: string; bankReference?: string }) => Promise<Settlement>;
		fail: (params: { settlementId: string; reason: string }) => Promise<Settlement>;
		get: (settlementId: string) => Promise<Settlement>;
		list: (
			params?: PaginationParams & {
				merchantId?: string;
				type?: SettlementType;
				status?: SettlementStatus;
			},
		) => Promise<PaginatedResult<Settlement>>;
		platformRevenue: (params?: { from?: Date; to?: Date }) => Promise<PlatformRevenue>;
	};
	limits: {
		requestIncrease: (params: {
			customerId: string;
			newLimit: number;
			reason?: string;
		}) => Promise<CustomerLimitHistory>;
		approve: (params: {
			requestId: string;
			approvedBy: string;
			reason?: string;
		}) => Promise<CustomerLimitHistory>;
		reject: (params: {
			requestId: string;
			rejectedBy: string;
			reason?: string;
		}) => Promise<CustomerLimitHistory>;
		history: (customerId: string) => Promise<CustomerLimitHistory[]>;
		listPending: (params?: PaginationParams) => Promise<PaginatedResult<CustomerLimitHistory>>;
	};
	sweep: {
		run: (options?: { now?: Date }) => Promise<SweepResult>;
	};
	$context: InstaloContext;
	$options: InstaloOptions;
}

// =============================================================================
// CREATE INSTALO
// =============================================================================

export function createInstalo(options: InstaloOptions): Instalo {
	const ctx = buildContext(options);

	return {
		customers: {
			create: (params) => customers.createCustomer(ctx, params),
			get: (customerId) => customers.getCustomer(ctx, customerId),
			getByCode: (code) => customers.getCustomerByCode(ctx, code),
			list: (params) => customers.listCustomers(ctx, params),
			getCredit: (customerId) => customers.getCreditSummary(ctx, customerId),
			setStatus: (params) => customers.setCustomerStatus(ctx, params),
			paymentStats: (customerId, opts) => customers.getPaymentStats(ctx, customerId, opts),
		},
		merchants: {
			create: (params) => merchants.createMerchant(ctx, params),
			get: (merchantId) => merchants.getMerchant(ctx, merchantId),
			list: (params) => merchants.listMerchants(ctx, params),
			setStatus: (params) => merchants.setMerchantStatus(ctx, params),
			stats: (merchantId, opts) => merchants.getMerchantStats(ctx, merchantId, opts),
		},
		purchaseRequests: {
			send: (params) => requests.sendPurchaseRequest(ctx, params),
			get: (requestId, opts) => requests.getPurchaseRequest(ctx, requestId, opts),
			list: (params) => requests.listPurchaseRequests(ctx, params),
			accept: (params) => requests.acceptPurchaseRequest(ctx, params),
			reject: (params) => requests.rejectPurchaseRequest(ctx, params),
			cancel: (params) => requests.cancelPurchaseRequest(ctx, params),
			expireStale: (opts) => requests.expireStaleRequests(ctx, opts),
		},
		transactions: {
			get: (transactionId, opts) => transactions.getTransaction(ctx, transactionId, opts),
			list: (params) => transactions.listTransactions(ctx, params),
			schedule: (transactionId, opts) =>
				transactions.getTransactionSchedule(ctx, transactionId, opts),
			markOverdue: (opts) => transactions.markOverdue(ctx, opts),
			markDefaulted: (params) => transactions.markDefaulted(ctx, params),
		},
		payments: {
			make: (params) => payments.makePayment(ctx, params),
			get: (paymentId) => payments.getPayment(ctx, paymentId),
			list: (params) => payments.listPayments(ctx, params),
			upcoming: (params) => payments.getUpcomingPayments(ctx, params),
			overdue: (params) => payments.getOverduePayments(ctx, params),
		},
		settlements: {
			requestWithdrawal: (params) => settlements.requestWithdrawal(ctx, params),
			process: (settlementId) => settlements.processSettlement(ctx, settlementId),
			complete: (params) => settlements.completeSettlement(ctx, params),
			fail: (params) => settlements.failSettlement(ctx, params),
			get: (settlementId) => settlements.getSettlement(ctx, settlementId),
			list: (params) => settlements.listSettlements(ctx, params),
			platformRevenue: (params) => settlements.getPlatformRevenue(ctx, params),
		},
		limits: {
			requestIncrease: (params) => limits.requestLimitIncrease(ctx, params),
			approve: (params) => limits.approveLimitIncrease(ctx, params),
			reject: (params) => limits.rejectLimitIncrease(ctx, params),
			history: (customerId) => limits.getLimitHistory(ctx, customerId),
			listPending: (params) => limits.listPendingLimitRequests(ctx, params),
		},
		sweep: {
			run: (opts) => runSweep(ctx, opts),
		},
		$context: ctx,
		$options: options,
	};
}
