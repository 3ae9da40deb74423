// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds TellerContext from TellerOptions. Resolves the store and logger and
// loads the account table.

import type { AccountStore, ResolvedTellerOptions, TellerContext, TellerOptions } from "@atm-teller/core";
import { createConsoleLogger } from "@atm-teller/core/logger";
import { validateConfig } from "../config/index.js";

const DEFAULT_CURRENCY = "INR";
const DEFAULT_STATEMENT_LIMIT = 10;

export function buildContext(options: TellerOptions): TellerContext {
	validateConfig(options);

	const store: AccountStore = typeof options.store === "function" ? options.store() : options.store;
	const logger = options.logger ?? createConsoleLogger({ level: "warn" });

	const resolved: ResolvedTellerOptions = {
		currency: options.currency ?? DEFAULT_CURRENCY,
		statementLimit: options.statementLimit ?? DEFAULT_STATEMENT_LIMIT,
	};

	const accounts = store.load();
	logger.debug("Teller context ready", { store: store.id, accounts: accounts.size });

	return {
		store,
		accounts,
		options: resolved,
		logger,
		clock: options.clock ?? (() => new Date()),
	};
}
