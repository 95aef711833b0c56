// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase <-> snake_case conversion and WHERE clause building for SQL adapters.

import type { Row, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: Row): Row {
	const result: Row = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Row): Row {
	const result: Row = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

/** Double-quote a column identifier after converting it to snake_case. */
export function quoteColumn(field: string): string {
	return `"${toSnakeCase(field).replace(/"/g, '""')}"`;
}

/**
 * Build a SQL WHERE clause (without the WHERE keyword) from conditions.
 * Placeholders are numbered `$startIndex`, `$startIndex + 1`, ...
 */
export function buildWhereClause(
	where: Where[],
	startIndex = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	const compare = (col: string, op: string, value: unknown) => {
		conditions.push(`${col} ${op} $${paramIdx}`);
		params.push(value);
		paramIdx++;
	};

	for (const w of where) {
		const col = quoteColumn(w.field);

		switch (w.operator) {
			case "eq":
				compare(col, "=", w.value);
				break;
			case "ne":
				compare(col, "!=", w.value);
				break;
			case "gt":
				compare(col, ">", w.value);
				break;
			case "gte":
				compare(col, ">=", w.value);
				break;
			case "lt":
				compare(col, "<", w.value);
				break;
			case "lte":
				compare(col, "<=", w.value);
				break;
			case "in": {
				if (!Array.isArray(w.value)) {
					throw new TypeError(`"in" condition on ${w.field} requires an array value`);
				}
				if (w.value.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = w.value.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`${col} IN (${placeholders})`);
				params.push(...w.value);
				paramIdx += w.value.length;
				break;
			}
			case "is_null":
				conditions.push(`${col} IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`${col} IS NOT NULL`);
				break;
		}
	}

	return { clause: conditions.join(" AND "), params };
}
