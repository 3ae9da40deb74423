// =============================================================================
// JSON LOGGER: one JSON object per line on stderr
// =============================================================================

import type { LogLevel, TellerLogger } from "../types/config.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { maskPins } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Line sink. Default: writes to `process.stderr` */
	write?: (line: string) => void;
	/** Default: `() => new Date()` */
	clock?: () => Date;
}

/**
 * Create a structured JSON logger implementing `TellerLogger`. Data fields
 * sit beside `time`, `level` and `msg`; they never overwrite them.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): TellerLogger {
	const minPriority = LEVEL_PRIORITY[options.level ?? "info"];
	const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
	const clock = options.clock ?? (() => new Date());

	function log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[level] < minPriority) return;
		write(JSON.stringify({ ...maskPins(data), time: clock().toISOString(), level, msg }));
	}

	return {
		debug: (message, data) => log("debug", message, data),
		info: (message, data) => log("info", message, data),
		warn: (message, data) => log("warn", message, data),
		error: (message, data) => log("error", message, data),
	};
}
