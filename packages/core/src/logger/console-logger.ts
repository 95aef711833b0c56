// =============================================================================
// CONSOLE LOGGER — Built-in InstaloLogger backed by console.*
// =============================================================================

import pc from "picocolors";
import type { InstaloLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./level.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Instalo"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". */
	redactKeys?: string[];
	/** Keys whose values are masked to their last four characters. */
	maskKeys?: string[];
}

/**
 * Create a console-based logger.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@instalo/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): InstaloLogger {
	const { level = "info", prefix = "Instalo", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const keys = buildRedactKeys(options.redactKeys, options.maskKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(pc.dim(new Date().toISOString()));
		}
		parts.push(LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		const safeData = redactData(data, keys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
