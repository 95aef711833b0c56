import { describe, expect, it } from "vitest";
import { CHECK_ROW_LIMIT, formatCheckRow, INVARIANT_CHECKS } from "../sql/checks.js";
import { lastMigrationSQL, STATUS_METRICS } from "../sql/status.js";

function check(id: string) {
	const found = INVARIANT_CHECKS.find((c) => c.id === id);
	if (!found) throw new Error(`missing check ${id}`);
	return found;
}

describe("INVARIANT_CHECKS", () => {
	it("has unique ids and bounded results", () => {
		const ids = INVARIANT_CHECKS.map((c) => c.id);
		expect(new Set(ids).size).toBe(ids.length);
		for (const c of INVARIANT_CHECKS) {
			expect(c.sql("instalo").endsWith(`LIMIT ${CHECK_ROW_LIMIT}`)).toBe(true);
		}
	});

	it("covers conservation, schedule sums, commission and paid amounts", () => {
		expect(INVARIANT_CHECKS.map((c) => c.id)).toEqual([
			"credit-conservation",
			"outstanding-matches-transactions",
			"schedule-sums",
			"commission-sums",
			"paid-within-total",
			"merchant-balance",
		]);
	});

	it("qualifies every table with the schema", () => {
		expect(check("merchant-balance").sql("ledger")).toBe(
			'SELECT id, balance\nFROM "ledger"."merchant"\nWHERE balance < 0\nLIMIT 10',
		);
		const sums = check("schedule-sums").sql("ledger");
		expect(sums).toContain('FROM "ledger"."repayment_plan" p');
		expect(sums).toContain('LEFT JOIN "ledger"."repayment_schedule" s ON s.plan_id = p.id');
	});

	it("leaves tables unqualified in the public schema", () => {
		for (const c of INVARIANT_CHECKS) {
			expect(c.sql("public")).not.toContain('"public".');
		}
		expect(check("credit-conservation").sql("public")).toContain('FROM "customer"');
	});

	it("treats only open transactions as outstanding", () => {
		expect(check("outstanding-matches-transactions").sql("public")).toContain(
			"ct.status NOT IN ('completed', 'cancelled')",
		);
	});
});

describe("formatCheckRow", () => {
	it("shortens ids and keeps other columns", () => {
		expect(formatCheckRow({ id: "0b6f7c1e-1111-2222-3333-444455556666", balance: -5 })).toBe(
			"id=0b6f7c1e... balance=-5",
		);
	});
});

describe("status queries", () => {
	it("reads the latest migration", () => {
		expect(lastMigrationSQL("instalo")).toBe(
			'SELECT hash, applied_at FROM "instalo"."_instalo_migrations" ORDER BY id DESC LIMIT 1',
		);
	});

	it("selects a single value column per metric", () => {
		const shape = /^SELECT (COUNT\(\*\)|COALESCE\(SUM\(\w+\), 0\))::bigint AS value FROM "instalo"\./;
		for (const metric of STATUS_METRICS) {
			expect(metric.sql("instalo")).toMatch(shape);
		}
	});
});
