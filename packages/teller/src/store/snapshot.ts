// =============================================================================
// SNAPSHOT CODEC -- AccountMap <-> persisted JSON
// =============================================================================
// Persisted shape:
//   { "<accountId>": { holderName, pin, balance, ledger: [{ timestamp, kind, amount, remark, balanceAfter }] } }
// Amounts are integers in smallest units. Timestamps are ISO-8601 strings.

import type { Account, AccountMap, Transaction, TransactionKind } from "@atm-teller/core";
import { TellerError, TRANSACTION_KINDS } from "@atm-teller/core";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true });

export interface TransactionRecord {
	timestamp: string;
	kind: TransactionKind;
	amount: number;
	remark: string;
	balanceAfter: number;
}

export interface AccountRecord {
	holderName: string;
	pin: string;
	balance: number;
	ledger: TransactionRecord[];
}

export type Snapshot = Record<string, AccountRecord>;

// =============================================================================
// ENCODE
// =============================================================================

export function toSnapshot(accounts: AccountMap): Snapshot {
	const snapshot: Snapshot = {};
	for (const [id, account] of accounts) {
		snapshot[id] = {
			holderName: account.holderName,
			pin: account.pin,
			balance: account.balance,
			ledger: account.ledger.map((tx) => ({
				timestamp: tx.timestamp.toISOString(),
				kind: tx.kind,
				amount: tx.amount,
				remark: tx.remark,
				balanceAfter: tx.balanceAfter,
			})),
		};
	}
	return snapshot;
}

/** Serialize the table with stable key order and two-space indentation. */
export function serializeAccounts(accounts: AccountMap): string {
	const text = deterministicStringify(toSnapshot(accounts), null, 2);
	if (text === undefined) {
		throw TellerError.internal("Account table could not be serialized");
	}
	return text;
}

// =============================================================================
// DECODE
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAmount(value: unknown): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isTransactionKind(value: unknown): value is TransactionKind {
	return TRANSACTION_KINDS.some((kind) => kind === value);
}

function corrupt(path: string, problem: string): TellerError {
	return TellerError.parseError(`Account snapshot is corrupt: ${path} ${problem}`);
}

function decodeTransaction(value: unknown, path: string): Transaction {
	if (!isRecord(value)) throw corrupt(path, "must be an object");

	const { timestamp, kind, amount, remark, balanceAfter } = value;
	if (typeof timestamp !== "string") throw corrupt(`${path}.timestamp`, "must be a string");
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) throw corrupt(`${path}.timestamp`, "is not a valid date");
	if (!isTransactionKind(kind)) throw corrupt(`${path}.kind`, "is not a known transaction kind");
	if (!isAmount(amount)) throw corrupt(`${path}.amount`, "must be a non-negative integer");
	if (typeof remark !== "string") throw corrupt(`${path}.remark`, "must be a string");
	if (!isAmount(balanceAfter)) {
		throw corrupt(`${path}.balanceAfter`, "must be a non-negative integer");
	}

	return Object.freeze({ timestamp: date, kind, amount, remark, balanceAfter });
}

function decodeAccount(id: string, value: unknown): Account {
	const path = `accounts.${id}`;
	if (!isRecord(value)) throw corrupt(path, "must be an object");

	const { holderName, pin, balance, ledger } = value;
	if (typeof holderName !== "string") throw corrupt(`${path}.holderName`, "must be a string");
	if (typeof pin !== "string") throw corrupt(`${path}.pin`, "must be a string");
	if (!isAmount(balance)) throw corrupt(`${path}.balance`, "must be a non-negative integer");
	if (!Array.isArray(ledger)) throw corrupt(`${path}.ledger`, "must be an array");

	return {
		id,
		holderName,
		pin,
		balance,
		ledger: ledger.map((entry, index) => decodeTransaction(entry, `${path}.ledger[${index}]`)),
	};
}

/**
 * Parse persisted snapshot text into an AccountMap.
 * Throws PARSE_ERROR on invalid JSON or a record that does not match the schema.
 */
export function parseSnapshot(raw: string): AccountMap {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw TellerError.parseError(`Account snapshot is corrupt: ${reason}`, error);
	}

	if (!isRecord(parsed)) throw corrupt("accounts", "must be an object");

	const accounts: AccountMap = new Map();
	for (const [id, value] of Object.entries(parsed)) {
		accounts.set(id, decodeAccount(id, value));
	}
	return accounts;
}
