// =============================================================================
// AFTER-COMMIT HOOKS
// =============================================================================
// Managers announce state changes (logs, notifications) from inside a ledger
// transaction; the announcements only go out once that transaction commits.

import { AsyncLocalStorage } from "node:async_hooks";

export type AfterCommitHook = () => void | Promise<void>;

const pendingHooks = new AsyncLocalStorage<AfterCommitHook[]>();

/** Defer `hook` until the enclosing transaction commits. No-op outside one. */
export function queueAfterTransactionHook(hook: AfterCommitHook): void {
	pendingHooks.getStore()?.push(hook);
}

/**
 * Run `fn` with a fresh hook queue. Hooks run in queue order once `fn`
 * resolves and are dropped if it rejects. A failing hook is handed to
 * `onHookError` and the remaining hooks still run.
 */
export async function runWithTransactionContext<T>(
	fn: () => Promise<T>,
	onHookError: (error: unknown, index: number) => void,
): Promise<T> {
	const hooks: AfterCommitHook[] = [];
	const result = await pendingHooks.run(hooks, fn);

	for (const [index, hook] of hooks.entries()) {
		try {
			await hook();
		} catch (error) {
			onHookError(error, index);
		}
	}

	return result;
}
