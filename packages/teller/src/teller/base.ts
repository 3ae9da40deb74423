// =============================================================================
// TELLER -- Main entry point
// =============================================================================
// Creates the Teller instance that provides the full account API. The account
// table is loaded once here and again on every reload().

import type { Account, Session, TellerContext, TellerOptions, Transaction } from "@atm-teller/core";
import { formatMoney } from "@atm-teller/core";
import { buildContext } from "../context/context.js";
import * as accounts from "../managers/account-manager.js";
import { seedDemoAccounts } from "../managers/demo-accounts.js";
import { formatStatementLine, getMiniStatement } from "../managers/statement-manager.js";
import * as transactions from "../managers/transaction-manager.js";
import type { AmountInput, TransferResult } from "../managers/transaction-manager.js";

// =============================================================================
// TELLER INTERFACE
// =============================================================================

export interface Teller {
	accounts: {
		create: (params: {
			id: string;
			holderName: string;
			pin: string;
			initialBalance?: number;
		}) => Account;
		exists: (accountId: string) => boolean;
		get: (accountId: string) => Account;
		getBalance: (accountId: string) => number;
		authenticate: (accountId: string, pin: string) => Session;
		verifyPin: (accountId: string, pin: string) => boolean;
		changePin: (params: {
			accountId: string;
			currentPin: string;
			newPin: string;
			confirmPin: string;
		}) => Transaction;
	};
	transactions: {
		deposit: (params: { accountId: string; amount: AmountInput; remark?: string }) => Transaction;
		withdraw: (params: { accountId: string; amount: AmountInput; remark?: string }) => Transaction;
		transfer: (params: {
			sourceId: string;
			destinationId: string;
			amount: AmountInput;
		}) => TransferResult;
	};
	statements: {
		mini: (accountId: string, limit?: number) => Transaction[];
		formatLine: (tx: Transaction) => string;
	};
	/** Create the demo accounts when the table is empty. */
	seedDemoAccounts: () => Account[];
	/** Discard the in-memory table and read it back from the store. */
	reload: () => void;
	/** Format smallest units with the configured currency glyph. */
	formatMoney: (amount: number) => string;
	$context: TellerContext;
	$options: TellerOptions;
}

// =============================================================================
// CREATE TELLER
// =============================================================================

export function createTeller(options: TellerOptions): Teller {
	const ctx = buildContext(options);
	const currency = ctx.options.currency;

	return {
		accounts: {
			create: (params) => accounts.createAccount(ctx, params),
			exists: (accountId) => accounts.accountExists(ctx, accountId),
			get: (accountId) => accounts.getAccount(ctx, accountId),
			getBalance: (accountId) => accounts.getBalance(ctx, accountId),
			authenticate: (accountId, pin) => accounts.authenticate(ctx, accountId, pin),
			verifyPin: (accountId, pin) => accounts.verifyPin(ctx, accountId, pin),
			changePin: (params) => accounts.changePin(ctx, params),
		},
		transactions: {
			deposit: (params) => transactions.deposit(ctx, params),
			withdraw: (params) => transactions.withdraw(ctx, params),
			transfer: (params) => transactions.transfer(ctx, params),
		},
		statements: {
			mini: (accountId, limit) => getMiniStatement(ctx, accountId, limit),
			formatLine: (tx) => formatStatementLine(tx, currency),
		},
		seedDemoAccounts: () => seedDemoAccounts(ctx),
		reload: () => {
			ctx.accounts = ctx.store.load();
			ctx.logger.debug("Account table reloaded", { accounts: ctx.accounts.size });
		},
		formatMoney: (amount) => formatMoney(amount, currency),
		$context: ctx,
		$options: options,
	};
}
