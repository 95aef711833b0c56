// =============================================================================
// MONEY — integer minor units, exact conversions, ppm rates
// =============================================================================

import { InstaloError } from "../error/index.js";
import { CURRENCY_DECIMALS } from "./currencies.js";

/** Rates are stored as parts per million: 0.005 → 5_000. */
export const PPM = 1_000_000;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export function isSupportedCurrency(currency: string): boolean {
	return Object.hasOwn(CURRENCY_DECIMALS, currency);
}

/**
 * Decimal places for display. Unknown codes fall back to 2.
 */
export function getDecimalPlaces(currency: string): number {
	return CURRENCY_DECIMALS[currency] ?? 2;
}

/**
 * Subunit count per major unit.
 * SAR → 100 (100 halalas = 1 riyal), KWD → 1000, JPY → 1
 */
export function getCurrencyPrecision(currency: string): number {
	return 10 ** getDecimalPlaces(currency);
}

export function isMinorUnits(value: unknown): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** Throws VALIDATION_ERROR unless `value` is a non-negative safe integer. */
export function assertMinorUnits(value: unknown, field: string): asserts value is number {
	if (!isMinorUnits(value)) {
		throw InstaloError.validation(`${field} must be a non-negative integer amount in minor units`, {
			field,
			value,
		});
	}
}

/**
 * Convert minor units to an exact decimal string.
 * 399900 → "3999.00"
 */
export function minorToDecimal(amount: number, currency = "SAR"): string {
	const decimals = getDecimalPlaces(currency);
	const precision = 10 ** decimals;
	const sign = amount < 0 ? "-" : "";
	const abs = Math.abs(amount);
	const whole = Math.trunc(abs / precision);
	if (decimals === 0) return `${sign}${whole}`;
	const fraction = String(abs % precision).padStart(decimals, "0");
	return `${sign}${whole}.${fraction}`;
}

/**
 * Parse a decimal amount into minor units without going through floats.
 * "1333.5" → 133350 (SAR). Rejects negatives, exponents and excess precision.
 */
export function parseAmount(value: string | number, currency = "SAR"): number {
	const decimals = getDecimalPlaces(currency);
	const text = typeof value === "number" ? String(value) : value.trim();
	const match = DECIMAL_PATTERN.exec(text);
	if (!match) {
		throw InstaloError.validation(`Invalid amount "${text}"`, { value });
	}
	const whole = match[1] ?? "0";
	const fraction = match[2] ?? "";
	if (fraction.length > decimals) {
		throw InstaloError.validation(
			`Amount "${text}" has more than ${decimals} decimal places for ${currency}`,
			{ value, currency },
		);
	}

	const minor = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
	if (minor > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw InstaloError.validation(`Amount "${text}" is too large`, { value });
	}
	return Number(minor);
}

/**
 * Convert a decimal rate in [0, 1] to parts per million.
 */
export function rateToPpm(rate: number): number {
	if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
		throw InstaloError.validation(`Rate must be between 0 and 1, got ${rate}`);
	}
	return Math.round(rate * PPM);
}

/**
 * `amount × ratePpm / 1e6`, rounded half-up to the nearest minor unit.
 * Uses BigInt so the product never loses precision.
 */
export function applyRate(amount: number, ratePpm: number): number {
	assertMinorUnits(amount, "amount");
	if (!Number.isInteger(ratePpm) || ratePpm < 0 || ratePpm > PPM) {
		throw InstaloError.validation(`Rate must be between 0 and ${PPM} ppm, got ${ratePpm}`);
	}
	const scale = BigInt(PPM);
	const product = BigInt(amount) * BigInt(ratePpm);
	let quotient = product / scale;
	if ((product % scale) * 2n >= scale) {
		quotient += 1n;
	}
	return Number(quotient);
}
