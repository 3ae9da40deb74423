import type { Account, TellerContext } from "@atm-teller/core";
import { getCurrencyPrecision } from "@atm-teller/core";
import { createAccount } from "./account-manager.js";

/** Opening balances are in major units of the configured currency. */
export const DEMO_ACCOUNTS = [
	{ id: "1001", holderName: "Alice", pin: "1234", openingBalance: 5000 },
	{ id: "1002", holderName: "Bob", pin: "2345", openingBalance: 3000 },
] as const;

/**
 * Bootstrap the demo accounts on an empty table. Returns the accounts created,
 * or an empty list when the table already holds accounts.
 */
export function seedDemoAccounts(ctx: TellerContext): Account[] {
	if (ctx.accounts.size > 0) return [];

	ctx.logger.info("No accounts found, creating demo accounts");
	const precision = getCurrencyPrecision(ctx.options.currency);
	return DEMO_ACCOUNTS.map(({ id, holderName, pin, openingBalance }) =>
		createAccount(ctx, { id, holderName, pin, initialBalance: openingBalance * precision }),
	);
}
