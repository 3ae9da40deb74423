// =============================================================================
// ACCOUNT MANAGER -- Account lifecycle and credentials
// =============================================================================
// Creates accounts, authenticates sessions and changes PINs. Every mutation
// appends a ledger entry and persists the whole table before returning.

import type { Account, Session, TellerContext, Transaction } from "@atm-teller/core";
import { isStrongPin, pinsMatch, TellerError } from "@atm-teller/core";
import { appendTransaction, persist, requireAccount } from "./ledger-helpers.js";

// =============================================================================
// CREATE ACCOUNT
// =============================================================================

export function createAccount(
	ctx: TellerContext,
	params: {
		id: string;
		holderName: string;
		pin: string;
		/** Opening balance in smallest units. Default: 0 */
		initialBalance?: number;
	},
): Account {
	const { id, holderName, pin, initialBalance = 0 } = params;

	if (id.trim() === "") {
		throw TellerError.invalidArgument("Account number is required.");
	}
	if (!Number.isSafeInteger(initialBalance) || initialBalance < 0) {
		throw TellerError.invalidAmount("Initial balance must be a non-negative amount.");
	}
	if (ctx.accounts.has(id)) {
		throw TellerError.alreadyExists();
	}

	const account: Account = {
		id,
		holderName,
		pin,
		balance: initialBalance,
		ledger: [],
	};
	ctx.accounts.set(id, account);
	appendTransaction(ctx, account, "created", 0, "Initial account setup");
	persist(ctx);

	ctx.logger.info("Account created", { accountId: id, balance: initialBalance });
	return account;
}

// =============================================================================
// READS
// =============================================================================

export function accountExists(ctx: TellerContext, accountId: string): boolean {
	return ctx.accounts.has(accountId);
}

export function getAccount(ctx: TellerContext, accountId: string): Account {
	return requireAccount(ctx, accountId);
}

export function getBalance(ctx: TellerContext, accountId: string): number {
	return requireAccount(ctx, accountId).balance;
}

// =============================================================================
// AUTHENTICATE
// =============================================================================

export function authenticate(ctx: TellerContext, accountId: string, pin: string): Session {
	const account = requireAccount(ctx, accountId);
	if (!pinsMatch(account.pin, pin)) {
		ctx.logger.warn("Login rejected", { accountId });
		throw TellerError.wrongPin();
	}
	ctx.logger.debug("Login accepted", { accountId });
	return { accountId: account.id, holderName: account.holderName };
}

/** Check a PIN without logging a failed attempt. */
export function verifyPin(ctx: TellerContext, accountId: string, pin: string): boolean {
	return pinsMatch(requireAccount(ctx, accountId).pin, pin);
}

// =============================================================================
// CHANGE PIN
// =============================================================================

export function changePin(
	ctx: TellerContext,
	params: {
		accountId: string;
		currentPin: string;
		newPin: string;
		confirmPin: string;
	},
): Transaction {
	const account = requireAccount(ctx, params.accountId);

	if (!pinsMatch(account.pin, params.currentPin)) {
		throw TellerError.wrongPin("Current PIN incorrect.");
	}
	if (params.newPin !== params.confirmPin) {
		throw TellerError.pinMismatch();
	}
	if (!isStrongPin(params.newPin)) {
		throw TellerError.weakPin();
	}

	account.pin = params.newPin;
	const entry = appendTransaction(ctx, account, "pin_change", 0, "PIN updated");
	persist(ctx);

	ctx.logger.info("PIN changed", { accountId: account.id });
	return entry;
}
