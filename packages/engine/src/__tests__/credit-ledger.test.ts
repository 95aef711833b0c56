import { isInstaloError } from "@instalo/core";
import { describe, expect, it } from "vitest";
import { computeNet } from "../managers/commission.js";
import {
	assertLedgerBalanced,
	raiseLimit,
	releaseCredit,
	reserveCredit,
} from "../managers/credit-ledger.js";

function thrownCode(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (err) {
		return isInstaloError(err) ? err.code : "not-an-instalo-error";
	}
	return undefined;
}

const fresh = { creditLimit: 200000, availableBalance: 200000, outstandingBalance: 0 };

describe("credit ledger", () => {
	it("moves a reservation from available to outstanding", () => {
		expect(reserveCredit(fresh, 150000)).toEqual({
			creditLimit: 200000,
			availableBalance: 50000,
			outstandingBalance: 150000,
		});
	});

	it("allows reserving the whole line", () => {
		expect(reserveCredit(fresh, 200000).availableBalance).toBe(0);
	});

	it("refuses to reserve past the available balance", () => {
		expect(thrownCode(() => reserveCredit(fresh, 200001))).toBe("INSUFFICIENT_CREDIT");
	});

	it("releases payments back to available", () => {
		const reserved = reserveCredit(fresh, 100000);
		expect(releaseCredit(reserved, 33333)).toEqual({
			creditLimit: 200000,
			availableBalance: 133333,
			outstandingBalance: 66667,
		});
	});

	it("treats a release beyond outstanding as an invariant violation", () => {
		expect(thrownCode(() => releaseCredit(fresh, 1))).toBe("INVARIANT_VIOLATION");
	});

	it("raises the limit and makes the whole delta available", () => {
		const reserved = reserveCredit(fresh, 150000);
		expect(raiseLimit(reserved, 300000, 5_000_000)).toEqual({
			creditLimit: 300000,
			availableBalance: 150000,
			outstandingBalance: 150000,
		});
	});

	it("checks the ceiling before the current limit", () => {
		expect(thrownCode(() => raiseLimit(fresh, 5_000_001, 5_000_000))).toBe("LIMIT_EXCEEDS_MAX");
		expect(thrownCode(() => raiseLimit(fresh, 200000, 5_000_000))).toBe("VALIDATION_ERROR");
	});

	it("detects an unbalanced ledger", () => {
		expect(
			thrownCode(() =>
				assertLedgerBalanced({ creditLimit: 100, availableBalance: 60, outstandingBalance: 30 }),
			),
		).toBe("INVARIANT_VIOLATION");
		expect(
			thrownCode(() =>
				assertLedgerBalanced({ creditLimit: 100, availableBalance: -10, outstandingBalance: 110 }),
			),
		).toBe("INVARIANT_VIOLATION");
	});
});

describe("computeNet", () => {
	it("rounds commission half-up", () => {
		// 399900 * 0.5% = 1999.5
		expect(computeNet(399900, 5000)).toEqual({ commissionAmount: 2000, netAmount: 397900 });
	});

	it("rounds down below the half", () => {
		// 100099 * 0.5% = 500.495
		expect(computeNet(100099, 5000)).toEqual({ commissionAmount: 500, netAmount: 99599 });
	});

	it("charges nothing at a zero rate", () => {
		expect(computeNet(12345, 0)).toEqual({ commissionAmount: 0, netAmount: 12345 });
	});

	it("always sums back to gross", () => {
		for (const gross of [1, 199, 200, 201, 33333, 4_999_999]) {
			const { commissionAmount, netAmount } = computeNet(gross, 25_000);
			expect(commissionAmount + netAmount).toBe(gross);
		}
	});
});
