import type { InstaloOptions } from "@instalo/core";
import { InstaloError, isSupportedCurrency } from "@instalo/core";

function invalid(message: string): InstaloError {
	return InstaloError.validation(`Instalo config: ${message}`);
}

function isPositiveInteger(value: number): boolean {
	return Number.isSafeInteger(value) && value > 0;
}

function isNonNegativeFinite(value: number): boolean {
	return Number.isFinite(value) && value >= 0;
}

/**
 * Validate Instalo configuration options at runtime.
 * Throws VALIDATION_ERROR naming the offending option.
 */
export function validateConfig(options: InstaloOptions): void {
	if (!options.database) {
		throw invalid("'database' adapter is required");
	}

	if (options.currency !== undefined && !isSupportedCurrency(options.currency)) {
		throw invalid(`unknown currency "${options.currency}". Use a supported ISO 4217 code.`);
	}

	if (
		options.commissionRate !== undefined &&
		(!Number.isFinite(options.commissionRate) ||
			options.commissionRate < 0 ||
			options.commissionRate > 1)
	) {
		throw invalid("'commissionRate' must be between 0 and 1");
	}

	const policy = options.creditPolicy;
	if (policy) {
		for (const key of ["defaultCreditLimit", "maxCreditLimit", "autoApproveLimit"] as const) {
			const value = policy[key];
			if (value !== undefined && !isPositiveInteger(value)) {
				throw invalid(`'creditPolicy.${key}' must be a positive integer in minor units`);
			}
		}
	}

	if (options.planTypes !== undefined) {
		if (options.planTypes.length === 0) {
			throw invalid("'planTypes' must list at least one installment count");
		}
		for (const planType of options.planTypes) {
			if (!isPositiveInteger(planType) || planType > 120) {
				throw invalid(`'planTypes' entries must be integers between 1 and 120, got ${planType}`);
			}
		}
		if (new Set(options.planTypes).size !== options.planTypes.length) {
			throw invalid("'planTypes' must not repeat an installment count");
		}
	}

	if (
		options.requestTtlHours !== undefined &&
		(!Number.isFinite(options.requestTtlHours) || options.requestTtlHours <= 0)
	) {
		throw invalid("'requestTtlHours' must be a positive number");
	}

	if (
		options.payInFullGraceDays !== undefined &&
		(!Number.isSafeInteger(options.payInFullGraceDays) || options.payInFullGraceDays < 0)
	) {
		throw invalid("'payInFullGraceDays' must be a non-negative integer");
	}

	const adv = options.advanced;
	if (adv) {
		if (
			adv.transactionTimeoutMs !== undefined &&
			(adv.transactionTimeoutMs <= 0 || !Number.isFinite(adv.transactionTimeoutMs))
		) {
			throw invalid("'advanced.transactionTimeoutMs' must be a positive finite number");
		}
		if (
			adv.lockTimeoutMs !== undefined &&
			(adv.lockTimeoutMs <= 0 || !Number.isFinite(adv.lockTimeoutMs))
		) {
			throw invalid("'advanced.lockTimeoutMs' must be a positive finite number");
		}
		if (
			adv.lockRetryCount !== undefined &&
			(!Number.isSafeInteger(adv.lockRetryCount) || adv.lockRetryCount < 0)
		) {
			throw invalid("'advanced.lockRetryCount' must be a non-negative integer");
		}
		if (adv.lockRetryBaseDelayMs !== undefined && !isNonNegativeFinite(adv.lockRetryBaseDelayMs)) {
			throw invalid("'advanced.lockRetryBaseDelayMs' must be a non-negative finite number");
		}
		if (adv.lockRetryMaxDelayMs !== undefined && !isNonNegativeFinite(adv.lockRetryMaxDelayMs)) {
			throw invalid("'advanced.lockRetryMaxDelayMs' must be a non-negative finite number");
		}
		if (adv.maxTransactionAmount !== undefined && !isPositiveInteger(adv.maxTransactionAmount)) {
			throw invalid("'advanced.maxTransactionAmount' must be a positive integer in minor units");
		}
	}

	if (options.schema !== undefined) {
		if (typeof options.schema !== "string" || options.schema.length === 0) {
			throw invalid("'schema' must be a non-empty string");
		}
		if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(options.schema)) {
			throw invalid(
				`'schema' must contain only alphanumeric characters and underscores, got "${options.schema}"`,
			);
		}
	}
}

/**
 * Identity function for defining Instalo configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineInstaloConfig } from "@instalo/engine";
 *
 * export default defineInstaloConfig({
 *   database: drizzleAdapter(db),
 *   currency: "SAR",
 * });
 * ```
 */
export function defineInstaloConfig(options: InstaloOptions): InstaloOptions {
	validateConfig(options);
	return options;
}
