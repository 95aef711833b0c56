// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds InstaloContext from InstaloOptions. Resolves the adapter and logger,
// merges config defaults and converts rates to ppm.

import type {
	InstaloAdapter,
	InstaloContext,
	InstaloOptions,
	ResolvedAdvancedOptions,
	ResolvedCreditPolicy,
	ResolvedInstaloOptions,
} from "@instalo/core";
import { InstaloError, rateToPpm } from "@instalo/core";
import { createConsoleLogger } from "@instalo/core/logger";
import { validateConfig } from "../config/index.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

export const DEFAULT_PLAN_TYPES: readonly number[] = [1, 3, 6, 12, 18, 24];

const DEFAULT_CREDIT_POLICY: ResolvedCreditPolicy = {
	defaultCreditLimit: 200_000,
	maxCreditLimit: 5_000_000,
	autoApproveLimit: 500_000,
};

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	transactionTimeoutMs: 5000,
	lockTimeoutMs: 3000,
	lockRetryCount: 3,
	lockRetryBaseDelayMs: 20,
	lockRetryMaxDelayMs: 250,
	maxTransactionAmount: 5_000_000,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export function buildContext(options: InstaloOptions): InstaloContext {
	validateConfig(options);

	const adapter: InstaloAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const creditPolicy: ResolvedCreditPolicy = {
		...DEFAULT_CREDIT_POLICY,
		...options.creditPolicy,
	};
	if (creditPolicy.autoApproveLimit > creditPolicy.maxCreditLimit) {
		throw InstaloError.validation(
			"Instalo config: 'creditPolicy.autoApproveLimit' must not exceed 'maxCreditLimit'",
		);
	}
	if (creditPolicy.defaultCreditLimit > creditPolicy.maxCreditLimit) {
		throw InstaloError.validation(
			"Instalo config: 'creditPolicy.defaultCreditLimit' must not exceed 'maxCreditLimit'",
		);
	}

	const advanced: ResolvedAdvancedOptions = {
		...DEFAULT_ADVANCED,
		...options.advanced,
	};

	const schema = options.schema ?? "instalo";
	const resolvedOptions: ResolvedInstaloOptions = {
		currency: options.currency ?? "SAR",
		commissionRatePpm: rateToPpm(options.commissionRate ?? 0.005),
		creditPolicy,
		planTypes: [...(options.planTypes ?? DEFAULT_PLAN_TYPES)].sort((a, b) => a - b),
		requestTtlHours: options.requestTtlHours ?? 24,
		payInFullGraceDays: options.payInFullGraceDays ?? 10,
		schema,
		advanced,
	};

	// SQL adapters qualify table names with the configured schema
	if (adapter.options) {
		adapter.options.schema = schema;
	}

	return {
		adapter,
		options: resolvedOptions,
		logger,
		clock: options.clock ?? (() => new Date()),
	};
}
