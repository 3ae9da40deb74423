import type { AccountStore } from "./store.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface TellerOptions {
	/** Account store instance or factory function */
	store: AccountStore | (() => AccountStore);

	/** Currency code used to parse and display amounts (default: "INR") */
	currency?: string;

	/** Custom logger */
	logger?: TellerLogger;

	/** Wall clock used to timestamp ledger entries. Default: `() => new Date()` */
	clock?: () => Date;

	/** Number of entries a mini statement shows by default. Default: 10 */
	statementLimit?: number;
}

export interface TellerLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
