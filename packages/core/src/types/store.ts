import type { AccountMap } from "./account.js";

/**
 * Persistence boundary for the account table. Both methods are synchronous
 * and operate on the whole table.
 */
export interface AccountStore {
	/** Store identifier, e.g. "file" or "memory" */
	readonly id: string;
	/** Returns an empty map when nothing has been persisted yet. */
	load(): AccountMap;
	/** Overwrites the persisted snapshot with `accounts`. */
	save(accounts: AccountMap): void;
}
