// Types
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, InstaloErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, InstaloError, isInstaloError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
