// =============================================================================
// SWEEP -- Persists lazily-derived states
// =============================================================================
// Reads already present lapsed requests as expired and late installments as
// overdue. The sweep writes those states down so reports and SQL checks see
// them. An advisory lock keeps concurrent sweepers from overlapping.

import type { InstaloContext } from "@instalo/core";
import { hashLockKey } from "@instalo/core";
import { withTransaction } from "../infrastructure/transaction.js";
import { expireStaleRequests } from "./purchase-request-manager.js";
import { markOverdue } from "./transaction-manager.js";

export const SWEEP_LOCK_KEY = "instalo:sweep";

export interface SweepResult {
	expiredRequests: number;
	overdueTransactions: number;
	overdueInstallments: number;
}

export async function runSweep(
	ctx: InstaloContext,
	options: { now?: Date } = {},
): Promise<SweepResult> {
	const now = options.now ?? ctx.clock();

	return withTransaction(ctx, async (tx) => {
		await tx.advisoryLock(hashLockKey(SWEEP_LOCK_KEY));

		const { expired } = await expireStaleRequests(ctx, { now });
		const overdue = await markOverdue(ctx, { now });

		ctx.logger.info("Sweep finished", {
			expiredRequests: expired,
			overdueTransactions: overdue.transactions,
			overdueInstallments: overdue.installments,
		});
		return {
			expiredRequests: expired,
			overdueTransactions: overdue.transactions,
			overdueInstallments: overdue.installments,
		};
	});
}
