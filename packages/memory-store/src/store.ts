// =============================================================================
// MEMORY STORE: AccountStore implementation backed by an in-process copy
// =============================================================================
// Designed for unit testing. No file system access.
// save() keeps a deep copy of the table so later in-memory mutations are only
// visible after the next save, the same as with a file.

import type { AccountMap, AccountStore } from "@atm-teller/core";

export interface MemoryAccountStore extends AccountStore {
	readonly id: "memory";
	/** Number of times save() has been called */
	readonly saveCount: number;
	/** Deep copy of the last saved table, or null when nothing was saved */
	peek(): AccountMap | null;
}

export function createMemoryAccountStore(initial?: AccountMap): MemoryAccountStore {
	let saved: AccountMap | null = initial ? structuredClone(initial) : null;
	let saveCount = 0;

	return {
		id: "memory",
		get saveCount() {
			return saveCount;
		},
		load() {
			return saved ? structuredClone(saved) : new Map();
		},
		save(accounts) {
			saved = structuredClone(accounts);
			saveCount++;
		},
		peek() {
			return saved ? structuredClone(saved) : null;
		},
	};
}
