export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export type { LogLevel } from "./level.js";
export { buildRedactKeys, maskValue, type RedactKeys, redactData } from "./redact.js";

import type { InstaloLogger } from "../types/config.js";

/** Logger that discards everything. */
export const silentLogger: InstaloLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
