import type { Account, TellerContext, Transaction, TransactionKind } from "@atm-teller/core";
import { TellerError } from "@atm-teller/core";

/** Look up an account or throw NOT_FOUND. */
export function requireAccount(ctx: TellerContext, accountId: string, message?: string): Account {
	const account = ctx.accounts.get(accountId);
	if (!account) {
		throw TellerError.fromCode("NOT_FOUND", { message, details: { accountId } });
	}
	return account;
}

/**
 * Reject a credit whose resulting balance is no longer a safe integer. Such a
 * balance could be saved but never loaded back.
 */
export function assertCreditFits(account: Account, amount: number): void {
	if (!Number.isSafeInteger(account.balance + amount)) {
		throw TellerError.fromCode("INVALID_AMOUNT", {
			message: "Amount exceeds the maximum balance.",
			details: { accountId: account.id, balance: account.balance, amount },
		});
	}
}

/**
 * Append an entry to the account's ledger. Must be called after the balance
 * has been updated: `balanceAfter` snapshots the current balance.
 */
export function appendTransaction(
	ctx: TellerContext,
	account: Account,
	kind: TransactionKind,
	amount: number,
	remark = "",
): Transaction {
	const entry: Transaction = Object.freeze({
		timestamp: ctx.clock(),
		kind,
		amount,
		remark,
		balanceAfter: account.balance,
	});
	account.ledger.push(entry);
	return entry;
}

/** Write the whole in-memory table back to the store. */
export function persist(ctx: TellerContext): void {
	ctx.store.save(ctx.accounts);
}
