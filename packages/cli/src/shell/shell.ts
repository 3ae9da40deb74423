// =============================================================================
// SHELL: the logged-out menu
// =============================================================================
// LoggedOut → Login → LoggedIn (runSession) → Exit → LoggedOut.
// The account table is reloaded from the store after every login attempt that
// ends normally. A fatal error propagates as thrown.

import { parseMinorUnits } from "@atm-teller/core";
import type { Teller } from "@atm-teller/teller";
import type { MenuOption, Prompter } from "./prompter.js";
import { guard, runSession, type SessionOptions } from "./session.js";

type TopAction = "login" | "create" | "exit";

const TOP_MENU: MenuOption<TopAction>[] = [
	{ value: "login", label: "Login" },
	{ value: "create", label: "Create new account" },
	{ value: "exit", label: "Exit" },
];

export interface ShellOptions extends SessionOptions {
	/** Create the demo accounts when the table is empty. */
	seedDemo: boolean;
}

function announceDemoAccounts(teller: Teller, prompter: Prompter): void {
	const created = teller.seedDemoAccounts();
	if (created.length === 0) return;

	const lines = created.map(
		(account) =>
			` - ${account.id} / PIN ${account.pin} (${account.holderName}, ${teller.formatMoney(account.balance)})`,
	);
	prompter.warn("No accounts found. Creating demo accounts...");
	prompter.message(["Demo accounts created:", ...lines].join("\n"));
}

async function loginFlow(teller: Teller, prompter: Prompter, options: SessionOptions) {
	const accountId = await prompter.text("Enter account number");
	if (accountId === null) return;
	if (!teller.accounts.exists(accountId)) {
		prompter.error("Account not found.");
		return;
	}
	const pin = await prompter.text("Enter PIN");
	if (pin === null) return;

	const session = teller.accounts.authenticate(accountId, pin);
	prompter.success(`Welcome, ${session.holderName}!`);
	await runSession(teller, prompter, session, options);
}

async function createFlow(teller: Teller, prompter: Prompter) {
	const id = await prompter.text("Choose a new account number");
	if (id === null) return;
	const holderName = await prompter.text("Enter account holder name");
	if (holderName === null) return;
	const pin = await prompter.text("Set PIN (min 4 digits)");
	if (pin === null) return;
	const initial = await prompter.text("Initial deposit (0 if none)", "0");
	if (initial === null) return;

	// Blank or unparseable opening deposits open the account empty.
	const initialBalance = parseMinorUnits(initial, teller.$context.options.currency) ?? 0;

	teller.accounts.create({ id, holderName, pin, initialBalance });
	prompter.success("Account created.");
}

export async function runShell(
	teller: Teller,
	prompter: Prompter,
	options: ShellOptions,
): Promise<void> {
	if (options.seedDemo) {
		announceDemoAccounts(teller, prompter);
	}

	for (;;) {
		const choice = await prompter.select("Welcome to the ATM", TOP_MENU);

		switch (choice) {
			case "login":
				await guard(prompter, () => loginFlow(teller, prompter, options));
				teller.reload();
				break;
			case "create":
				await guard(prompter, () => createFlow(teller, prompter));
				break;
			case "exit":
			case null:
				prompter.outro("Exiting. Goodbye.");
				return;
		}
	}
}
