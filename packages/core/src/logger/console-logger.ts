// =============================================================================
// CONSOLE LOGGER: human-readable diagnostics for the interactive shell
// =============================================================================
// One line per entry, e.g. `WARN  Login rejected accountId=1001`. Lines go to
// stderr so they never interleave with the menus clack draws on stdout.

import pc from "picocolors";
import type { LogLevel, TellerLogger } from "../types/config.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { maskPins } from "./redact.js";

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Force colours on or off. Default: picocolors' terminal detection */
	colors?: boolean;
	/** Line sink. Default: writes to `process.stderr` */
	write?: (line: string) => void;
}

function formatValue(value: unknown): string {
	if (typeof value === "string") {
		return /^\S+$/.test(value) ? value : JSON.stringify(value);
	}
	if (typeof value === "number" || typeof value === "boolean" || value === null) {
		return String(value);
	}
	return JSON.stringify(value) ?? String(value);
}

/** Render log data as ` key=value` pairs in insertion order. */
export function formatFields(data: Record<string, unknown>): string {
	return Object.entries(data)
		.map(([key, value]) => ` ${key}=${formatValue(value)}`)
		.join("");
}

/**
 * Create a console logger implementing `TellerLogger`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@atm-teller/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("Account created", { accountId: "1001", balance: 500000 });
 * // INFO  Account created accountId=1001 balance=500000
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): TellerLogger {
	const minPriority = LEVEL_PRIORITY[options.level ?? "info"];
	const c = options.colors === undefined ? pc : pc.createColors(options.colors);
	const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

	const tint: Record<LogLevel, (s: string) => string> = {
		debug: c.gray,
		info: c.cyan,
		warn: c.yellow,
		error: c.red,
	};

	function log(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;
		const label = tint[lvl](lvl.toUpperCase().padEnd(5));
		const fields = formatFields(maskPins(data));
		write(fields ? `${label} ${message}${c.dim(fields)}` : `${label} ${message}`);
	}

	return {
		debug: (message, data) => log("debug", message, data),
		info: (message, data) => log("info", message, data),
		warn: (message, data) => log("warn", message, data),
		error: (message, data) => log("error", message, data),
	};
}
