import type { AccountMap } from "./account.js";
import type { TellerLogger } from "./config.js";
import type { AccountStore } from "./store.js";

export interface TellerContext {
	store: AccountStore;
	/** In-memory table. Replaced wholesale on reload. */
	accounts: AccountMap;
	options: ResolvedTellerOptions;
	logger: TellerLogger;
	clock: () => Date;
}

export interface ResolvedTellerOptions {
	currency: string;
	statementLimit: number;
}
