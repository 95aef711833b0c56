// =============================================================================
// JSON LOGGER — One JSON object per line for log aggregation
// =============================================================================

import type { InstaloLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./level.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name stamped on every line. Default: `"instalo"` */
	service?: string;
	redactKeys?: string[];
	maskKeys?: string[];
	/** Line sink. Default: stdout, with warn/error going to stderr. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

export function createJsonLogger(options: JsonLoggerOptions = {}): InstaloLogger {
	const { level = "info", service = "instalo", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const keys = buildRedactKeys(options.redactKeys, options.maskKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...redactData(data, keys),
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
