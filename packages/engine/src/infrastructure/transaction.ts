// =============================================================================
// TRANSACTION RUNNER
// =============================================================================
// Every mutating operation runs through withTransaction: one adapter
// transaction per attempt, bounded retries for transient conflicts, and
// after-commit hooks drained only once the attempt commits.

import type { InstaloContext } from "@instalo/core";
import { InstaloError, isInstaloError } from "@instalo/core";
import { type InstaloTransactionAdapter, runWithTransactionContext } from "@instalo/core/db";

/** serialization_failure, deadlock_detected, lock_not_available */
const RETRYABLE_PG_CODES = new Set(["40001", "40P01", "55P03"]);

function pgErrorCode(err: unknown): string | null {
	if (typeof err !== "object" || err === null) return null;
	if ("code" in err && typeof err.code === "string") return err.code;
	// drizzle wraps driver errors
	if ("cause" in err) return pgErrorCode(err.cause);
	return null;
}

export function isRetryableError(err: unknown): boolean {
	if (isInstaloError(err)) {
		return err.code === "OPTIMISTIC_LOCK_CONFLICT" || err.code === "BUSY";
	}
	const code = pgErrorCode(err);
	return code !== null && RETRYABLE_PG_CODES.has(code);
}

export async function withTransaction<T>(
	ctx: InstaloContext,
	operation: (tx: InstaloTransactionAdapter) => Promise<T>,
): Promise<T> {
	const { lockRetryCount, lockRetryBaseDelayMs, lockRetryMaxDelayMs } = ctx.options.advanced;

	for (let attempt = 0; attempt <= lockRetryCount; attempt++) {
		try {
			return await executeTransaction(ctx, operation);
		} catch (err) {
			if (!isRetryableError(err)) {
				if (isInstaloError(err, "INVARIANT_VIOLATION")) {
					ctx.logger.error("Ledger invariant violated, transaction rolled back", {
						message: err.message,
						...err.details,
					});
				}
				throw err;
			}
			if (attempt === lockRetryCount) {
				throw InstaloError.busy(
					`Gave up after ${attempt + 1} attempts on a contended resource`,
					err,
				);
			}
			const delay = Math.min(lockRetryBaseDelayMs * 2 ** attempt, lockRetryMaxDelayMs);
			const jitter = delay * (0.5 + Math.random());
			ctx.logger.debug("Transaction retry due to contention", {
				attempt: attempt + 1,
				maxRetries: lockRetryCount,
				delayMs: Math.round(jitter),
			});
			await new Promise((resolve) => setTimeout(resolve, jitter));
		}
	}

	// Unreachable: the last attempt either returns or throws
	throw InstaloError.internal("Retry loop exited without result");
}

async function executeTransaction<T>(
	ctx: InstaloContext,
	operation: (tx: InstaloTransactionAdapter) => Promise<T>,
): Promise<T> {
	const { transactionTimeoutMs, lockTimeoutMs } = ctx.options.advanced;

	return runWithTransactionContext(
		() =>
			ctx.adapter.transaction(async (tx) => {
				if (tx.options?.dialectName === "postgres") {
					await tx.rawMutate(`SET LOCAL statement_timeout = ${Math.floor(transactionTimeoutMs)}`, []);
					await tx.rawMutate(`SET LOCAL lock_timeout = ${Math.floor(lockTimeoutMs)}`, []);
				}
				return operation(tx);
			}),
		(error, index) => {
			ctx.logger.error("After-commit callback failed", {
				index,
				error: error instanceof Error ? error.message : String(error),
			});
		},
	);
}
