import { TellerError } from "@atm-teller/core";
import { getTestInstance } from "@atm-teller/test-utils";
import { describe, expect, it, vi } from "vitest";
import { runShell } from "../shell/shell.js";
import { createScriptedPrompter } from "./scripted-prompter.js";

function options(seedDemo = true) {
	return { seedDemo, logoutDelayMs: 700, sleep: vi.fn(async (_ms: number) => {}) };
}

describe("runShell", () => {
	it("seeds demo accounts, logs in, deposits, prints a statement and exits", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"deposit",
			"200.00",
			"statement",
			"exit",
			"exit",
		]);
		const opts = options();

		await runShell(teller, prompter, opts);

		expect(prompter.output).toEqual([
			["warn", "No accounts found. Creating demo accounts..."],
			[
				"message",
				"Demo accounts created:\n - 1001 / PIN 1234 (Alice, ₹5000.00)\n - 1002 / PIN 2345 (Bob, ₹3000.00)",
			],
			["success", "Welcome, Alice!"],
			["success", "Deposited ₹200.00. New balance: ₹5200.00"],
			[
				"message",
				[
					"Last 2 transactions:",
					"2026-01-15 09:30:00 | Account Created | ₹0.00 | Bal: ₹5000.00 | Initial account setup",
					"2026-01-15 09:30:02 | Deposit      | ₹200.00 | Bal: ₹5200.00 | Cash deposit",
				].join("\n"),
			],
			["info", "Logging out..."],
			["outro", "Exiting. Goodbye."],
		]);
		expect(opts.sleep).toHaveBeenCalledWith(700);
		expect(teller.accounts.getBalance("1001")).toBe(520000);
		expect(prompter.remaining()).toBe(0);
	});

	it("does not ask for a PIN when the account is unknown", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "9999", "exit"]);

		await runShell(teller, prompter, options(false));

		expect(prompter.output).toContainEqual(["error", "Account not found."]);
		expect(prompter.asked).not.toContain("Enter PIN");
	});

	it("rejects a wrong PIN and stays logged out", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "0000", "exit"]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "Invalid PIN."]);
		expect(prompter.asked).not.toContain("ATM Menu");
	});

	it("reports insufficient funds and keeps the balance", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"withdraw",
			"6000",
			"balance",
			"exit",
			"exit",
		]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "Insufficient funds."]);
		expect(prompter.output).toContainEqual(["info", "Your current balance: ₹5000.00"]);
	});

	it("reports an invalid amount", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "1234", "deposit", "abc", "exit", "exit"]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "Invalid amount."]);
	});

	it("transfers to another account", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"transfer",
			"1002",
			"100",
			"exit",
			"exit",
		]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual([
			"success",
			"Transferred ₹100.00 to 1002. New balance: ₹4900.00",
		]);
		expect(teller.accounts.getBalance("1002")).toBe(310000);
	});

	it("does not ask for an amount when the destination is unknown", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"transfer",
			"7777",
			"exit",
			"exit",
		]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "Destination account does not exist."]);
		expect(prompter.asked).not.toContain("Enter amount to transfer");
	});

	it("changes the PIN and accepts it on the next login", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"pin",
			"1234",
			"5678",
			"5678",
			"exit",
			"login",
			"1001",
			"5678",
			"exit",
			"exit",
		]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["success", "PIN changed successfully."]);
		expect(prompter.output.filter(([, text]) => text === "Welcome, Alice!")).toHaveLength(2);
	});

	it("stops the PIN change when the current PIN is wrong", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "1234", "pin", "0000", "exit", "exit"]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "Current PIN incorrect."]);
		expect(prompter.asked).not.toContain("Enter new PIN");
	});

	it("rejects a weak new PIN", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"login",
			"1001",
			"1234",
			"pin",
			"1234",
			"12",
			"12",
			"exit",
			"exit",
		]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["error", "PIN must be numeric and at least 4 digits."]);
		expect(teller.accounts.get("1001").pin).toBe("1234");
	});

	it("creates accounts and rejects duplicates", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter([
			"create",
			"2001",
			"Carol",
			"4321",
			"250.50",
			"create",
			"2001",
			"Mallory",
			"1111",
			"5",
			"create",
			"2002",
			"Dan",
			"1111",
			"lots",
			"exit",
		]);

		await runShell(teller, prompter, options(false));

		expect(prompter.output).toEqual([
			["success", "Account created."],
			["error", "Account already exists."],
			["success", "Account created."],
			["outro", "Exiting. Goodbye."],
		]);
		expect(teller.accounts.get("2001").holderName).toBe("Carol");
		expect(teller.accounts.getBalance("2001")).toBe(25050);
		expect(teller.accounts.getBalance("2002")).toBe(0);
	});

	it("prints a notice for an empty ledger", async () => {
		const { teller } = getTestInstance({
			accounts: new Map([
				["3001", { id: "3001", holderName: "Erin", pin: "3001", balance: 0, ledger: [] }],
			]),
		});
		const prompter = createScriptedPrompter(["login", "3001", "3001", "statement", "exit", "exit"]);

		await runShell(teller, prompter, options());

		expect(prompter.output).toContainEqual(["info", "No transactions yet."]);
		expect(teller.accounts.exists("1001")).toBe(false);
	});

	it("treats a cancelled menu as logout and exit", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "1234", null, null]);

		await runShell(teller, prompter, options());

		expect(prompter.output.slice(-2)).toEqual([
			["info", "Logging out..."],
			["outro", "Exiting. Goodbye."],
		]);
	});

	it("returns to the menu when a prompt is cancelled", async () => {
		const { teller } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "1234", "deposit", null, "exit", "exit"]);

		await runShell(teller, prompter, options());

		expect(teller.accounts.get("1001").ledger).toHaveLength(1);
		expect(prompter.remaining()).toBe(0);
	});

	it("persists once per mutation", async () => {
		const { teller, store } = getTestInstance();
		const prompter = createScriptedPrompter(["login", "1001", "1234", "deposit", "10", "exit", "exit"]);
		const save = vi.spyOn(store, "save");

		await runShell(teller, prompter, options());

		// Two demo accounts and one deposit.
		expect(save).toHaveBeenCalledTimes(3);
		expect(teller.accounts.getBalance("1001")).toBe(501000);
	});

	it("propagates errors that are not validation errors", async () => {
		const { teller, store } = getTestInstance();
		teller.seedDemoAccounts();
		vi.spyOn(store, "save").mockImplementation(() => {
			throw new Error("disk full");
		});
		const prompter = createScriptedPrompter(["login", "1001", "1234", "deposit", "10"]);

		await expect(runShell(teller, prompter, options())).rejects.toThrow("disk full");
		// The failed write never reached the store.
		expect(teller.accounts.getBalance("1001")).toBe(500000);
	});

	it("does not let an unreadable store hide the error that ended the session", async () => {
		const { teller, store } = getTestInstance();
		teller.seedDemoAccounts();
		vi.spyOn(store, "save").mockImplementation(() => {
			throw new Error("disk full");
		});
		const load = vi.spyOn(store, "load").mockImplementation(() => {
			throw TellerError.parseError();
		});
		const prompter = createScriptedPrompter(["login", "1001", "1234", "deposit", "10"]);

		await expect(runShell(teller, prompter, options())).rejects.toThrow("disk full");
		expect(load).not.toHaveBeenCalled();
	});

	it("reloads the table after a session ends", async () => {
		const { teller, store } = getTestInstance();
		teller.seedDemoAccounts();
		const load = vi.spyOn(store, "load");
		const prompter = createScriptedPrompter(["login", "1001", "1234", "exit", "exit"]);

		await runShell(teller, prompter, options());

		expect(load).toHaveBeenCalledTimes(1);
	});
});
