import type { Transaction } from "@atm-teller/core";
import type { Teller } from "@atm-teller/teller";

/**
 * Assert that a specific account has the expected balance (smallest units).
 */
export function assertAccountBalance(teller: Teller, accountId: string, expected: number): void {
	const balance = teller.accounts.getBalance(accountId);
	if (balance !== expected) {
		throw new Error(`Account ${accountId}: expected balance ${expected}, got ${balance}`);
	}
}

function signedDelta(tx: Transaction): number {
	switch (tx.kind) {
		case "deposit":
		case "transfer_in":
			return tx.amount;
		case "withdrawal":
		case "transfer_out":
			return -tx.amount;
		case "created":
		case "pin_change":
			return 0;
	}
}

/**
 * Assert that an account's ledger replays to its balance: the first entry is
 * `created`, each later `balanceAfter` equals the previous one plus the entry's
 * signed amount, and the last `balanceAfter` equals the current balance.
 */
export function assertLedgerConsistent(teller: Teller, accountId: string): void {
	const account = teller.accounts.get(accountId);
	const [first, ...rest] = account.ledger;
	if (!first || first.kind !== "created") {
		throw new Error(`Account ${accountId}: ledger must start with a 'created' entry`);
	}

	let running = first.balanceAfter;
	for (const [index, tx] of rest.entries()) {
		running += signedDelta(tx);
		if (tx.balanceAfter !== running) {
			throw new Error(
				`Account ${accountId}: entry ${index + 1} (${tx.kind}) has balanceAfter ${tx.balanceAfter}, expected ${running}`,
			);
		}
	}

	if (running !== account.balance) {
		throw new Error(
			`Account ${accountId}: ledger replays to ${running}, balance is ${account.balance}`,
		);
	}
}
