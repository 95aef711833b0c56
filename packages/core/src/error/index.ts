import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type InstaloErrorCode = BaseErrorCode;

export class InstaloError extends Error {
	readonly code: InstaloErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the condition is transient. Callers may retry transient errors;
	 * deterministic ones fail identically every time.
	 */
	readonly transient: boolean;

	constructor(
		code: InstaloErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			status?: number;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? BASE_ERROR_CODES[code].status;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "InstaloError";
	}

	/**
	 * Create an InstaloError from a typed error code, using the registry's
	 * default message and status.
	 */
	static fromCode(
		code: InstaloErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): InstaloError {
		const raw = BASE_ERROR_CODES[code];
		return new InstaloError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	// --- Transient ---

	static insufficientCredit(message = "Insufficient credit", details?: Record<string, unknown>) {
		return new InstaloError("INSUFFICIENT_CREDIT", message, { details });
	}

	static insufficientBalance(message = "Insufficient balance", details?: Record<string, unknown>) {
		return new InstaloError("INSUFFICIENT_BALANCE", message, { details });
	}

	static optimisticLockConflict(
		message = "Row was modified by a concurrent operation",
		cause?: unknown,
	) {
		return new InstaloError("OPTIMISTIC_LOCK_CONFLICT", message, { cause });
	}

	static busy(message = "Resource is busy, try again", cause?: unknown) {
		return new InstaloError("BUSY", message, { cause });
	}

	// --- Deterministic ---

	static validation(message = "Validation failed", details?: Record<string, unknown>) {
		return new InstaloError("VALIDATION_ERROR", message, { details });
	}

	static invalidAmount(message = "Invalid amount", details?: Record<string, unknown>) {
		return new InstaloError("INVALID_AMOUNT", message, { details });
	}

	static notFound(message = "Resource not found") {
		return new InstaloError("NOT_FOUND", message);
	}

	static forbidden(message = "Not allowed") {
		return new InstaloError("FORBIDDEN", message);
	}

	static accountInactive(message = "Account is not active") {
		return new InstaloError("ACCOUNT_INACTIVE", message);
	}

	static requestExpired(message = "Purchase request has expired") {
		return new InstaloError("REQUEST_EXPIRED", message);
	}

	static invalidState(message = "Invalid state transition", details?: Record<string, unknown>) {
		return new InstaloError("INVALID_STATE", message, { details });
	}

	static transactionNotActive(message = "Transaction does not accept payments") {
		return new InstaloError("TRANSACTION_NOT_ACTIVE", message);
	}

	static limitExceedsMax(
		message = "Requested limit exceeds the maximum credit limit",
		details?: Record<string, unknown>,
	) {
		return new InstaloError("LIMIT_EXCEEDS_MAX", message, { details });
	}

	static invariantViolation(message: string, details?: Record<string, unknown>) {
		return new InstaloError("INVARIANT_VIOLATION", message, { details });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new InstaloError("INTERNAL", message, { cause });
	}
}

/** Narrow an unknown thrown value, optionally to a specific code. */
export function isInstaloError(err: unknown, code?: InstaloErrorCode): err is InstaloError {
	if (!(err instanceof InstaloError)) return false;
	return code === undefined || err.code === code;
}
