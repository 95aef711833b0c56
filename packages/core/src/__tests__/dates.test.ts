import { describe, expect, it } from "vitest";
import { addCalendarDays, addCalendarMonths, compactTimestamp } from "../utils/dates.js";
import { generateCustomerCode, generateReference } from "../utils/reference.js";

describe("addCalendarMonths", () => {
	it("adds calendar months keeping the time of day", () => {
		const base = new Date("2024-03-15T10:30:00.000Z");
		expect(addCalendarMonths(base, 1).toISOString()).toBe("2024-04-15T10:30:00.000Z");
		expect(addCalendarMonths(base, 12).toISOString()).toBe("2025-03-15T10:30:00.000Z");
	});

	it("clamps month-end overflow", () => {
		const jan31 = new Date("2024-01-31T10:00:00.000Z");
		expect(addCalendarMonths(jan31, 1).toISOString()).toBe("2024-02-29T10:00:00.000Z");
		expect(addCalendarMonths(jan31, 2).toISOString()).toBe("2024-03-31T10:00:00.000Z");
		expect(addCalendarMonths(new Date("2023-01-31T00:00:00.000Z"), 1).toISOString()).toBe(
			"2023-02-28T00:00:00.000Z",
		);
	});

	it("does not mutate its input", () => {
		const base = new Date("2024-01-31T00:00:00.000Z");
		addCalendarMonths(base, 1);
		expect(base.toISOString()).toBe("2024-01-31T00:00:00.000Z");
	});
});

describe("addCalendarDays", () => {
	it("crosses leap days", () => {
		const base = new Date("2024-02-28T08:00:00.000Z");
		expect(addCalendarDays(base, 1).toISOString()).toBe("2024-02-29T08:00:00.000Z");
		expect(addCalendarDays(base, 10).toISOString()).toBe("2024-03-09T08:00:00.000Z");
	});
});

describe("references", () => {
	it("formats timestamps in UTC", () => {
		expect(compactTimestamp(new Date("2024-01-05T09:03:07.000Z"))).toBe("20240105090307");
	});

	it("builds prefixed reference numbers", () => {
		const ref = generateReference("PR", new Date("2024-01-05T09:03:07.000Z"));
		expect(ref).toMatch(/^PR-20240105090307-[0-9A-F]{6}$/);
	});

	it("builds customer codes", () => {
		expect(generateCustomerCode()).toMatch(/^[A-Z0-9]{8}$/);
		expect(generateCustomerCode(4)).toMatch(/^[A-Z0-9]{4}$/);
	});
});
