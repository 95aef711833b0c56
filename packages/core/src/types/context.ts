import type { InstaloAdapter } from "../db/adapter.js";
import type { InstaloLogger } from "./config.js";

export interface InstaloContext {
	adapter: InstaloAdapter;
	options: ResolvedInstaloOptions;
	logger: InstaloLogger;
	clock: () => Date;
}

export interface ResolvedInstaloOptions {
	currency: string;
	commissionRatePpm: number;
	creditPolicy: ResolvedCreditPolicy;
	planTypes: readonly number[];
	requestTtlHours: number;
	payInFullGraceDays: number;
	schema: string;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedCreditPolicy {
	defaultCreditLimit: number;
	maxCreditLimit: number;
	autoApproveLimit: number;
}

export interface ResolvedAdvancedOptions {
	transactionTimeoutMs: number;
	lockTimeoutMs: number;
	lockRetryCount: number;
	lockRetryBaseDelayMs: number;
	lockRetryMaxDelayMs: number;
	maxTransactionAmount: number;
}
