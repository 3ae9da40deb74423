// =============================================================================
// SESSION: the authenticated menu
// =============================================================================
// LoggedIn state. Every action runs to completion against the teller before
// the menu is shown again. Validation errors are printed and the loop
// continues; anything else propagates.

import type { Session } from "@atm-teller/core";
import { isRecoverableError } from "@atm-teller/core";
import type { Teller } from "@atm-teller/teller";
import type { MenuOption, Prompter } from "./prompter.js";

type SessionAction = "balance" | "deposit" | "withdraw" | "transfer" | "statement" | "pin" | "exit";

const SESSION_MENU: MenuOption<SessionAction>[] = [
	{ value: "balance", label: "Check Balance" },
	{ value: "deposit", label: "Deposit" },
	{ value: "withdraw", label: "Withdraw" },
	{ value: "transfer", label: "Transfer" },
	{ value: "statement", label: "Mini Statement" },
	{ value: "pin", label: "Change PIN" },
	{ value: "exit", label: "Exit", hint: "log out" },
];

export interface SessionOptions {
	/** Cosmetic pause on logout */
	logoutDelayMs: number;
	sleep: (ms: number) => Promise<void>;
}

/** Run `action`, printing recoverable errors instead of throwing them. */
export async function guard(prompter: Prompter, action: () => Promise<void> | void): Promise<void> {
	try {
		await action();
	} catch (error) {
		if (isRecoverableError(error)) {
			prompter.error(error.message);
			return;
		}
		throw error;
	}
}

async function depositFlow(teller: Teller, prompter: Prompter, accountId: string) {
	const amount = await prompter.text("Enter amount to deposit");
	if (amount === null) return;
	const tx = teller.transactions.deposit({ accountId, amount });
	prompter.success(
		`Deposited ${teller.formatMoney(tx.amount)}. New balance: ${teller.formatMoney(tx.balanceAfter)}`,
	);
}

async function withdrawFlow(teller: Teller, prompter: Prompter, accountId: string) {
	const amount = await prompter.text("Enter amount to withdraw");
	if (amount === null) return;
	const tx = teller.transactions.withdraw({ accountId, amount });
	prompter.success(
		`Withdrew ${teller.formatMoney(tx.amount)}. New balance: ${teller.formatMoney(tx.balanceAfter)}`,
	);
}

async function transferFlow(teller: Teller, prompter: Prompter, accountId: string) {
	const destinationId = await prompter.text("Enter destination account number");
	if (destinationId === null) return;
	if (!teller.accounts.exists(destinationId)) {
		prompter.error("Destination account does not exist.");
		return;
	}
	const amount = await prompter.text("Enter amount to transfer");
	if (amount === null) return;

	const { outgoing } = teller.transactions.transfer({ sourceId: accountId, destinationId, amount });
	prompter.success(
		`Transferred ${teller.formatMoney(outgoing.amount)} to ${destinationId}. New balance: ${teller.formatMoney(outgoing.balanceAfter)}`,
	);
}

function statementFlow(teller: Teller, prompter: Prompter, accountId: string) {
	const entries = teller.statements.mini(accountId);
	if (entries.length === 0) {
		prompter.info("No transactions yet.");
		return;
	}
	const lines = entries.map((tx) => teller.statements.formatLine(tx));
	prompter.message([`Last ${entries.length} transactions:`, ...lines].join("\n"));
}

async function changePinFlow(teller: Teller, prompter: Prompter, accountId: string) {
	const currentPin = await prompter.text("Enter current PIN");
	if (currentPin === null) return;
	if (!teller.accounts.verifyPin(accountId, currentPin)) {
		prompter.error("Current PIN incorrect.");
		return;
	}
	const newPin = await prompter.text("Enter new PIN");
	if (newPin === null) return;
	const confirmPin = await prompter.text("Confirm new PIN");
	if (confirmPin === null) return;

	teller.accounts.changePin({ accountId, currentPin, newPin, confirmPin });
	prompter.success("PIN changed successfully.");
}

export async function runSession(
	teller: Teller,
	prompter: Prompter,
	session: Session,
	options: SessionOptions,
): Promise<void> {
	const { accountId } = session;

	for (;;) {
		const choice = await prompter.select("ATM Menu", SESSION_MENU);

		switch (choice) {
			case "balance":
				await guard(prompter, () => {
					prompter.info(
						`Your current balance: ${teller.formatMoney(teller.accounts.getBalance(accountId))}`,
					);
				});
				break;
			case "deposit":
				await guard(prompter, () => depositFlow(teller, prompter, accountId));
				break;
			case "withdraw":
				await guard(prompter, () => withdrawFlow(teller, prompter, accountId));
				break;
			case "transfer":
				await guard(prompter, () => transferFlow(teller, prompter, accountId));
				break;
			case "statement":
				await guard(prompter, () => statementFlow(teller, prompter, accountId));
				break;
			case "pin":
				await guard(prompter, () => changePinFlow(teller, prompter, accountId));
				break;
			case "exit":
			case null:
				prompter.info("Logging out...");
				await options.sleep(options.logoutDelayMs);
				return;
		}
	}
}
