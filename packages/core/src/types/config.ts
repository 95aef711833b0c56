import type { InstaloAdapter } from "../db/adapter.js";

export interface InstaloOptions {
	/** Database adapter instance or factory function */
	database: InstaloAdapter | (() => InstaloAdapter);

	/** Ledger currency (default: "SAR") */
	currency?: string;

	/** Platform commission as a decimal rate in [0, 1]. Default: 0.005 */
	commissionRate?: number;

	/** Customer credit limits, in minor units */
	creditPolicy?: CreditPolicyOptions;

	/** Installment counts customers may choose. Default: [1, 3, 6, 12, 18, 24] */
	planTypes?: number[];

	/** Hours a purchase request stays acceptable. Default: 24 */
	requestTtlHours?: number;

	/** Days until a pay-in-full (plan type 1) installment is due. Default: 10 */
	payInFullGraceDays?: number;

	/** Custom logger */
	logger?: InstaloLogger;

	/** PostgreSQL schema name for all tables. Default: "instalo" */
	schema?: string;

	/** Time source. Default: `() => new Date()` */
	clock?: () => Date;

	advanced?: InstaloAdvancedOptions;
}

export interface CreditPolicyOptions {
	/** Limit granted at registration. Default: 200_000 (2,000.00) */
	defaultCreditLimit?: number;
	/** Hard ceiling for any limit. Default: 5_000_000 (50,000.00) */
	maxCreditLimit?: number;
	/** Increases up to this limit are approved without an admin. Default: 500_000 (5,000.00) */
	autoApproveLimit?: number;
}

export interface InstaloAdvancedOptions {
	/** Statement timeout in ms (PostgreSQL only). Default: 5000 */
	transactionTimeoutMs?: number;
	/** Lock wait timeout in ms (PostgreSQL only). Default: 3000 */
	lockTimeoutMs?: number;
	/** Retries for transient conflicts before surfacing BUSY. Default: 3 */
	lockRetryCount?: number;
	/** Base delay between retries, doubled each attempt plus jitter. Default: 20 */
	lockRetryBaseDelayMs?: number;
	/** Maximum delay between retries. Default: 250 */
	lockRetryMaxDelayMs?: number;
	/** Largest purchase total accepted, in minor units. Default: 5_000_000 */
	maxTransactionAmount?: number;
}

export interface InstaloLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
