// =============================================================================
// ROW LOCKS — FIFO mutex per key
// =============================================================================
// Releasing a held key hands it straight to the oldest waiter. A waiter that
// times out leaves the queue and fails with BUSY.

import { InstaloError } from "@instalo/core/error";

export type Release = () => void;

interface LockState {
	waiters: Array<() => void>;
}

export class RowLocks {
	private held = new Map<string, LockState>();

	constructor(private readonly timeoutMs: number) {}

	async acquire(key: string): Promise<Release> {
		const state = this.held.get(key);
		if (!state) {
			this.held.set(key, { waiters: [] });
			return this.releaser(key);
		}

		await new Promise<void>((resolve, reject) => {
			const waiter = () => {
				clearTimeout(timer);
				resolve();
			};
			const timer = setTimeout(() => {
				const index = state.waiters.indexOf(waiter);
				if (index !== -1) state.waiters.splice(index, 1);
				reject(InstaloError.busy(`Lock wait timeout on ${key}`));
			}, this.timeoutMs);
			state.waiters.push(waiter);
		});
		return this.releaser(key);
	}

	/** Number of keys currently held. */
	get size(): number {
		return this.held.size;
	}

	private releaser(key: string): Release {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			const state = this.held.get(key);
			const next = state?.waiters.shift();
			if (next) {
				next();
			} else {
				this.held.delete(key);
			}
		};
	}
}
