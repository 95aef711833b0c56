// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error the engine can surface, with HTTP status and a
// transient flag for callers deciding whether to retry.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change on its own.
	 *
	 * - `true`: a lock may be released or a concurrent write may settle.
	 * - `false` (default): the same call will fail the same way until the
	 *   caller changes something (pays down credit, waits for income).
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient
	OPTIMISTIC_LOCK_CONFLICT: {
		message: "Row was modified by a concurrent operation",
		status: 409,
		transient: true,
	},
	BUSY: { message: "Resource is busy, try again", status: 503, transient: true },

	// Deterministic
	INSUFFICIENT_CREDIT: { message: "Insufficient credit", status: 422, transient: false },
	INSUFFICIENT_BALANCE: { message: "Insufficient balance", status: 422, transient: false },
	VALIDATION_ERROR: { message: "Validation failed", status: 400, transient: false },
	INVALID_AMOUNT: { message: "Invalid amount", status: 400, transient: false },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: false },
	FORBIDDEN: { message: "Not allowed", status: 403, transient: false },
	ACCOUNT_INACTIVE: { message: "Account is not active", status: 403, transient: false },
	REQUEST_EXPIRED: { message: "Purchase request has expired", status: 410, transient: false },
	INVALID_STATE: { message: "Invalid state transition", status: 409, transient: false },
	TRANSACTION_NOT_ACTIVE: {
		message: "Transaction does not accept payments",
		status: 409,
		transient: false,
	},
	LIMIT_EXCEEDS_MAX: {
		message: "Requested limit exceeds the maximum credit limit",
		status: 422,
		transient: false,
	},
	INVARIANT_VIOLATION: { message: "Ledger invariant violated", status: 500, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
