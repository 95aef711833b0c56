// =============================================================================
// PII REDACTION
// =============================================================================
// Bank details travel through withdrawal logs; account numbers and IBANs are
// masked down to their last four characters, everything else listed is dropped.

const DEFAULT_REDACT_KEYS = ["password", "token", "secret", "email", "phone"];
const DEFAULT_MASK_KEYS = ["iban", "bankAccountNumber"];

const MAX_DEPTH = 4;

export interface RedactKeys {
	redact: Set<string>;
	mask: Set<string>;
}

/** Build the key sets from user-provided keys, falling back to the defaults. */
export function buildRedactKeys(userKeys?: string[], maskKeys?: string[]): RedactKeys {
	return {
		redact: new Set(userKeys ?? DEFAULT_REDACT_KEYS),
		mask: new Set(maskKeys ?? DEFAULT_MASK_KEYS),
	};
}

/** "SA0380000000608010167519" → "****7519" */
export function maskValue(value: unknown): string {
	const str = String(value);
	if (str.length <= 4) return "****";
	return `****${str.slice(-4)}`;
}

/**
 * Redact log data. Nested plain objects are walked up to a fixed depth.
 * Returns the input untouched when nothing matched.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: RedactKeys,
	depth = 0,
): Record<string, unknown> | undefined {
	if (!data || depth > MAX_DEPTH) return data;
	if (keys.redact.size === 0 && keys.mask.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	const set = (key: string, value: unknown) => {
		if (!redacted) redacted = { ...data };
		redacted[key] = value;
	};

	for (const [key, value] of Object.entries(data)) {
		if (keys.redact.has(key)) {
			set(key, "[REDACTED]");
		} else if (keys.mask.has(key) && value !== null && value !== undefined) {
			set(key, maskValue(value));
		} else if (isPlainObject(value)) {
			const inner = redactData(value, keys, depth + 1);
			if (inner !== value) set(key, inner);
		}
	}
	return redacted ?? data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}
