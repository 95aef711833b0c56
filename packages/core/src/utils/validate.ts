// =============================================================================
// INPUT VALIDATION
// =============================================================================
// Guards run before any state mutation. Each throws VALIDATION_ERROR naming the
// offending field.

import { InstaloError } from "../error/index.js";

export function requireString(
	value: unknown,
	field: string,
	options: { maxLength?: number } = {},
): string {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw InstaloError.validation(`${field} is required`, { field });
	}
	const trimmed = value.trim();
	if (options.maxLength !== undefined && trimmed.length > options.maxLength) {
		throw InstaloError.validation(`${field} must be at most ${options.maxLength} characters`, {
			field,
		});
	}
	return trimmed;
}

export function optionalString(
	value: unknown,
	field: string,
	options: { maxLength?: number } = {},
): string | null {
	if (value === undefined || value === null || value === "") return null;
	return requireString(value, field, options);
}

export function requirePositiveInteger(value: unknown, field: string): number {
	if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
		throw InstaloError.validation(`${field} must be a positive integer`, { field, value });
	}
	return value;
}

export function requireOneOf<T extends string | number>(
	value: unknown,
	allowed: readonly T[],
	field: string,
): T {
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw InstaloError.validation(`${field} must be one of: ${allowed.join(", ")}`, {
			field,
			value,
		});
	}
	return match;
}
