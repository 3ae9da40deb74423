// =============================================================================
// FILE STORE -- AccountStore backed by a single JSON file
// =============================================================================
// Every save rewrites the whole file in place. There is no atomic rename and
// no lock: a crash mid-write can leave a truncated file, and two processes
// sharing the file overwrite each other (last write wins).

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { AccountMap, AccountStore, TellerLogger } from "@atm-teller/core";
import { parseSnapshot, serializeAccounts } from "./snapshot.js";

export interface FileAccountStoreOptions {
	/** Path of the snapshot file. Relative paths resolve against `cwd`. */
	path: string;
	cwd?: string;
	logger?: TellerLogger;
}

export interface FileAccountStore extends AccountStore {
	readonly id: "file";
	/** Absolute path of the snapshot file */
	readonly path: string;
}

export function createFileAccountStore(options: FileAccountStoreOptions): FileAccountStore {
	const path = resolve(options.cwd ?? process.cwd(), options.path);
	const logger = options.logger;

	return {
		id: "file",
		path,

		load(): AccountMap {
			if (!existsSync(path)) {
				logger?.debug("No snapshot found, starting empty", { path });
				return new Map();
			}
			const accounts = parseSnapshot(readFileSync(path, "utf-8"));
			logger?.debug("Snapshot loaded", { path, accounts: accounts.size });
			return accounts;
		},

		save(accounts: AccountMap): void {
			mkdirSync(dirname(path), { recursive: true });
			writeFileSync(path, serializeAccounts(accounts), "utf-8");
			logger?.debug("Snapshot saved", { path, accounts: accounts.size });
		},
	};
}
