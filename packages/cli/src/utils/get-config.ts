// =============================================================================
// Config loader: uses c12 (UnJS) for config file discovery
// =============================================================================
// Precedence, lowest first: built-in defaults, teller.config.* file,
// TELLER_* environment variables (.env is loaded by dotenv at startup),
// command-line flags.

import type { LogLevel } from "@atm-teller/core";
import { TellerError } from "@atm-teller/core";
import { isLogLevel } from "@atm-teller/core/logger";
import { loadConfig } from "c12";

export type LogFormat = "pretty" | "json";

export interface TellerCliConfig {
	/** Snapshot file, relative to cwd unless absolute */
	dataFile: string;
	currency: string;
	logLevel: LogLevel;
	logFormat: LogFormat;
	/** Create demo accounts when the store is empty */
	seedDemo: boolean;
	/** Cosmetic pause on logout */
	logoutDelayMs: number;
	/** Entries shown on a mini statement */
	statementLimit: number;
}

export type CliFlags = {
	cwd: string;
	config?: string;
	data?: string;
	currency?: string;
	logLevel?: string;
	jsonLogs?: boolean;
	/** commander sets this to false for --no-demo */
	demo?: boolean;
};

export const DEFAULT_CONFIG: TellerCliConfig = {
	dataFile: "accounts.json",
	currency: "INR",
	logLevel: "warn",
	logFormat: "pretty",
	seedDemo: true,
	logoutDelayMs: 700,
	statementLimit: 10,
};

type Layer = Partial<Record<keyof TellerCliConfig, unknown>>;

function invalid(source: string, key: string, expected: string): TellerError {
	return TellerError.invalidArgument(`Invalid ${source} value for "${key}": expected ${expected}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyLayer(base: TellerCliConfig, layer: Layer, source: string): TellerCliConfig {
	const next = { ...base };

	if (layer.dataFile !== undefined) {
		if (typeof layer.dataFile !== "string" || layer.dataFile.trim() === "") {
			throw invalid(source, "dataFile", "a non-empty path");
		}
		next.dataFile = layer.dataFile;
	}
	if (layer.currency !== undefined) {
		if (typeof layer.currency !== "string" || !/^[A-Za-z]{3}$/.test(layer.currency)) {
			throw invalid(source, "currency", "a 3-letter ISO 4217 code");
		}
		next.currency = layer.currency.toUpperCase();
	}
	if (layer.logLevel !== undefined) {
		if (!isLogLevel(layer.logLevel)) {
			throw invalid(source, "logLevel", "one of debug, info, warn, error");
		}
		next.logLevel = layer.logLevel;
	}
	if (layer.logFormat !== undefined) {
		if (layer.logFormat !== "pretty" && layer.logFormat !== "json") {
			throw invalid(source, "logFormat", '"pretty" or "json"');
		}
		next.logFormat = layer.logFormat;
	}
	if (layer.seedDemo !== undefined) {
		if (typeof layer.seedDemo !== "boolean") throw invalid(source, "seedDemo", "a boolean");
		next.seedDemo = layer.seedDemo;
	}
	if (layer.logoutDelayMs !== undefined) {
		const value = layer.logoutDelayMs;
		if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
			throw invalid(source, "logoutDelayMs", "a non-negative integer");
		}
		next.logoutDelayMs = value;
	}
	if (layer.statementLimit !== undefined) {
		const value = layer.statementLimit;
		if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
			throw invalid(source, "statementLimit", "a positive integer");
		}
		next.statementLimit = value;
	}

	return next;
}

function envLayer(env: NodeJS.ProcessEnv): Layer {
	const layer: Layer = {};
	if (env.TELLER_DATA_FILE) layer.dataFile = env.TELLER_DATA_FILE;
	if (env.TELLER_CURRENCY) layer.currency = env.TELLER_CURRENCY;
	if (env.TELLER_LOG_LEVEL) layer.logLevel = env.TELLER_LOG_LEVEL;
	if (env.TELLER_LOG_FORMAT) layer.logFormat = env.TELLER_LOG_FORMAT;
	return layer;
}

function flagLayer(flags: CliFlags): Layer {
	const layer: Layer = {};
	if (flags.data !== undefined) layer.dataFile = flags.data;
	if (flags.currency !== undefined) layer.currency = flags.currency;
	if (flags.logLevel !== undefined) layer.logLevel = flags.logLevel;
	if (flags.jsonLogs) layer.logFormat = "json";
	if (flags.demo === false) layer.seedDemo = false;
	return layer;
}

/**
 * Merge every configuration source over the defaults. Throws INVALID_ARGUMENT
 * naming the offending source and key.
 */
export function mergeConfig(
	fileConfig: unknown,
	env: NodeJS.ProcessEnv,
	flags: CliFlags,
): TellerCliConfig {
	let config = DEFAULT_CONFIG;
	if (fileConfig !== undefined && fileConfig !== null) {
		if (!isRecord(fileConfig)) {
			throw TellerError.invalidArgument("Invalid config file: expected an object");
		}
		config = applyLayer(config, fileConfig, "config file");
	}
	config = applyLayer(config, envLayer(env), "environment");
	return applyLayer(config, flagLayer(flags), "command-line");
}

/**
 * Discover `teller.config.*` (or the file named by --config) under `cwd` and
 * merge it with the environment and flags.
 */
export async function getConfig(
	flags: CliFlags,
	env: NodeJS.ProcessEnv = process.env,
): Promise<TellerCliConfig> {
	const { config } = await loadConfig<Record<string, unknown>>({
		name: "teller",
		cwd: flags.cwd,
		configFile: flags.config,
		rcFile: false,
		packageJson: false,
		globalRc: false,
		dotenv: false,
	});
	return mergeConfig(config, env, flags);
}
