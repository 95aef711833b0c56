import { describe, expect, it } from "vitest";
import { InstaloError } from "../error/index.js";
import {
	applyRate,
	assertMinorUnits,
	getCurrencyPrecision,
	getDecimalPlaces,
	isSupportedCurrency,
	minorToDecimal,
	parseAmount,
	rateToPpm,
} from "../utils/money.js";

describe("currency table", () => {
	it("knows precision per currency", () => {
		expect(getCurrencyPrecision("SAR")).toBe(100);
		expect(getCurrencyPrecision("KWD")).toBe(1000);
		expect(getCurrencyPrecision("JPY")).toBe(1);
		expect(getDecimalPlaces("XYZ")).toBe(2);
	});

	it("reports supported codes", () => {
		expect(isSupportedCurrency("SAR")).toBe(true);
		expect(isSupportedCurrency("XYZ")).toBe(false);
		expect(isSupportedCurrency("toString")).toBe(false);
	});
});

describe("minorToDecimal", () => {
	it("formats exactly", () => {
		expect(minorToDecimal(399900)).toBe("3999.00");
		expect(minorToDecimal(33334, "SAR")).toBe("333.34");
		expect(minorToDecimal(5)).toBe("0.05");
		expect(minorToDecimal(0)).toBe("0.00");
	});

	it("handles other precisions and negatives", () => {
		expect(minorToDecimal(10000, "KWD")).toBe("10.000");
		expect(minorToDecimal(10000, "JPY")).toBe("10000");
		expect(minorToDecimal(-500)).toBe("-5.00");
	});
});

describe("parseAmount", () => {
	it("parses decimal strings into minor units", () => {
		expect(parseAmount("3999.00")).toBe(399900);
		expect(parseAmount("333.33")).toBe(33333);
		expect(parseAmount("0.1")).toBe(10);
		expect(parseAmount("  12 ")).toBe(1200);
		expect(parseAmount("1.234", "KWD")).toBe(1234);
		expect(parseAmount("500", "JPY")).toBe(500);
	});

	it("parses numbers without float drift", () => {
		expect(parseAmount(1333.5)).toBe(133350);
		expect(parseAmount(0.29)).toBe(29);
	});

	it.each(["-1", "1e3", "abc", "", "1.234", "1."])("rejects %j", (value) => {
		expect(() => parseAmount(value)).toThrow(InstaloError);
	});

	it("rejects fractions for zero-decimal currencies", () => {
		expect(() => parseAmount("5.5", "JPY")).toThrow(/more than 0 decimal places/);
	});

	it("rejects values beyond the safe integer range", () => {
		expect(() => parseAmount("99999999999999999")).toThrow(/too large/);
	});
});

describe("rateToPpm", () => {
	it("converts decimal rates", () => {
		expect(rateToPpm(0.005)).toBe(5000);
		expect(rateToPpm(0)).toBe(0);
		expect(rateToPpm(1)).toBe(1_000_000);
	});

	it("rejects rates outside [0, 1]", () => {
		expect(() => rateToPpm(1.5)).toThrow(/between 0 and 1/);
		expect(() => rateToPpm(-0.1)).toThrow(/between 0 and 1/);
		expect(() => rateToPpm(Number.NaN)).toThrow(/between 0 and 1/);
	});
});

describe("applyRate", () => {
	it("rounds half up", () => {
		// 399900 × 0.005 = 1999.5
		expect(applyRate(399900, 5000)).toBe(2000);
		// 33333 × 0.005 = 166.665
		expect(applyRate(33333, 5000)).toBe(167);
		expect(applyRate(1, 499_999)).toBe(0);
		expect(applyRate(1, 500_000)).toBe(1);
	});

	it("is exact at the bounds", () => {
		expect(applyRate(100000, 5000)).toBe(500);
		expect(applyRate(123456, 0)).toBe(0);
		expect(applyRate(123456, 1_000_000)).toBe(123456);
	});

	it("rejects negative amounts and bad rates", () => {
		expect(() => applyRate(-1, 5000)).toThrow(/amount must be a non-negative integer/);
		expect(() => applyRate(100, 1_000_001)).toThrow(/ppm/);
		expect(() => applyRate(100, 0.5)).toThrow(/ppm/);
	});
});

describe("assertMinorUnits", () => {
	it("accepts safe non-negative integers", () => {
		expect(() => assertMinorUnits(0, "amount")).not.toThrow();
		expect(() => assertMinorUnits(Number.MAX_SAFE_INTEGER, "amount")).not.toThrow();
	});

	it.each([1.5, -1, Number.NaN, "100", null])("rejects %j", (value) => {
		expect(() => assertMinorUnits(value, "amount")).toThrow(
			"amount must be a non-negative integer amount in minor units",
		);
	});
});
