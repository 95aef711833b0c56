import { randomBytes, randomInt, randomUUID } from "node:crypto";
import { compactTimestamp } from "./dates.js";

export type ReferencePrefix = "PR" | "TXN" | "PLAN" | "PAY" | "STL";

/** `PR-20240115093000-1A2B3C` */
export function generateReference(prefix: ReferencePrefix, now: Date = new Date()): string {
	return `${prefix}-${compactTimestamp(now)}-${randomBytes(3).toString("hex").toUpperCase()}`;
}

const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/** Short code a customer hands to a merchant at checkout. */
export function generateCustomerCode(length = 8): string {
	let code = "";
	for (let i = 0; i < length; i++) {
		code += CODE_ALPHABET.charAt(randomInt(CODE_ALPHABET.length));
	}
	return code;
}

export function generateId(): string {
	return randomUUID();
}
