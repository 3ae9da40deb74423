import type { Transaction } from "./transaction.js";

export interface Account {
	id: string;
	holderName: string;
	/** Plain-text digits. Length and charset are checked on change only. */
	pin: string;
	/** Settled balance in smallest units (paise/cents). Never negative. */
	balance: number;
	/** Append-only, oldest first. */
	ledger: Transaction[];
}

/** The full account table, keyed by account id. */
export type AccountMap = Map<string, Account>;

/** Proof of a successful login. */
export interface Session {
	accountId: string;
	holderName: string;
}
