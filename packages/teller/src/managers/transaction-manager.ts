// =============================================================================
// TRANSACTION MANAGER -- Deposit, withdraw, transfer
// =============================================================================
// Amounts arrive as user text (or a number) in major units and are parsed
// into smallest units of the configured currency. Validation runs before any
// mutation, so a rejected operation leaves balances and ledgers untouched.

import type { TellerContext, Transaction } from "@atm-teller/core";
import { parseAmount, TellerError } from "@atm-teller/core";
import { appendTransaction, assertCreditFits, persist, requireAccount } from "./ledger-helpers.js";

export type AmountInput = string | number;

// =============================================================================
// DEPOSIT
// =============================================================================

export function deposit(
	ctx: TellerContext,
	params: { accountId: string; amount: AmountInput; remark?: string },
): Transaction {
	const account = requireAccount(ctx, params.accountId);
	const amount = parseAmount(params.amount, ctx.options.currency);
	assertCreditFits(account, amount);

	account.balance += amount;
	const entry = appendTransaction(ctx, account, "deposit", amount, params.remark ?? "Cash deposit");
	persist(ctx);

	ctx.logger.debug("Deposit posted", { accountId: account.id, amount, balance: account.balance });
	return entry;
}

// =============================================================================
// WITHDRAW
// =============================================================================

export function withdraw(
	ctx: TellerContext,
	params: { accountId: string; amount: AmountInput; remark?: string },
): Transaction {
	const account = requireAccount(ctx, params.accountId);
	const amount = parseAmount(params.amount, ctx.options.currency);

	if (amount > account.balance) {
		throw TellerError.insufficientFunds();
	}

	account.balance -= amount;
	const entry = appendTransaction(
		ctx,
		account,
		"withdrawal",
		amount,
		params.remark ?? "Cash withdrawal",
	);
	persist(ctx);

	ctx.logger.debug("Withdrawal posted", { accountId: account.id, amount, balance: account.balance });
	return entry;
}

// =============================================================================
// TRANSFER
// =============================================================================

export interface TransferResult {
	/** Entry appended to the source ledger */
	outgoing: Transaction;
	/** Entry appended to the destination ledger */
	incoming: Transaction;
}

/**
 * Move funds between two accounts. Both legs are applied in memory and then
 * persisted with a single save; there is no rollback if that save fails.
 */
export function transfer(
	ctx: TellerContext,
	params: { sourceId: string; destinationId: string; amount: AmountInput },
): TransferResult {
	const source = requireAccount(ctx, params.sourceId);
	const destination = requireAccount(
		ctx,
		params.destinationId,
		"Destination account does not exist.",
	);
	if (destination.id === source.id) {
		throw TellerError.invalidArgument("Cannot transfer to the same account.");
	}

	const amount = parseAmount(params.amount, ctx.options.currency);
	if (amount > source.balance) {
		throw TellerError.insufficientFunds();
	}
	assertCreditFits(destination, amount);

	source.balance -= amount;
	destination.balance += amount;
	const outgoing = appendTransaction(ctx, source, "transfer_out", amount, `To ${destination.id}`);
	const incoming = appendTransaction(ctx, destination, "transfer_in", amount, `From ${source.id}`);
	persist(ctx);

	ctx.logger.debug("Transfer posted", {
		sourceId: source.id,
		destinationId: destination.id,
		amount,
	});
	return { outgoing, incoming };
}
