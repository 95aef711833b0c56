import { describe, expect, it } from "vitest";
import { hashLockKey } from "../utils/lock.js";

describe("hashLockKey", () => {
	it("returns a signed 32-bit integer", () => {
		const result = hashLockKey("instalo:sweep");
		expect(Number.isInteger(result)).toBe(true);
		expect(result).toBeGreaterThanOrEqual(-2147483648);
		expect(result).toBeLessThanOrEqual(2147483647);
	});

	it("is deterministic", () => {
		expect(hashLockKey("customer:c-1")).toBe(hashLockKey("customer:c-1"));
	});

	it("separates different keys", () => {
		expect(hashLockKey("customer:c-1")).not.toBe(hashLockKey("customer:c-2"));
	});

	it("hashes the empty string to the FNV offset basis", () => {
		expect(hashLockKey("")).toBe(0x811c9dc5 | 0);
	});
});
