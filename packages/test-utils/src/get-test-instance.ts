import type { InstaloAdapter, InstaloLogger, InstaloOptions } from "@instalo/core";
import { silentLogger } from "@instalo/core/logger";
import { createInstalo, type Instalo } from "@instalo/engine";
import { memoryAdapter } from "@instalo/memory-adapter";

export interface TestClock {
	now: () => Date;
	set: (date: Date | string) => void;
	advance: (by: { days?: number; hours?: number; minutes?: number }) => void;
}

/** A clock frozen at `start` that only moves when told to. */
export function createTestClock(start: Date | string = "2025-01-15T10:00:00.000Z"): TestClock {
	let current = new Date(start);
	return {
		now: () => new Date(current.getTime()),
		set: (date) => {
			current = new Date(date);
		},
		advance: ({ days = 0, hours = 0, minutes = 0 }) => {
			current = new Date(
				current.getTime() + ((days * 24 + hours) * 60 + minutes) * 60_000,
			);
		},
	};
}

export interface TestInstanceOptions extends Partial<Omit<InstaloOptions, "database" | "clock">> {
	/** Database adapter. Default: a fresh memoryAdapter() */
	adapter?: InstaloAdapter;
	/** Start of the test clock. Default: 2025-01-15T10:00:00Z */
	startAt?: Date | string;
	logger?: InstaloLogger;
}

export interface TestInstance {
	instalo: Instalo;
	clock: TestClock;
	adapter: InstaloAdapter;
}

export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const { adapter = memoryAdapter(), startAt, logger = silentLogger, ...rest } = options;
	const clock = createTestClock(startAt);
	const instalo = createInstalo({
		...rest,
		database: adapter,
		logger,
		clock: clock.now,
	});
	return { instalo, clock, adapter };
}
