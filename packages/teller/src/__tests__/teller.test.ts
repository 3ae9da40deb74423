import { TellerError } from "@atm-teller/core";
import { createMemoryAccountStore } from "@atm-teller/memory-store";
import { getTestInstance, silentLogger } from "@atm-teller/test-utils";
import { describe, expect, it, vi } from "vitest";
import { createTeller } from "../teller/base.js";

describe("createTeller", () => {
	it("returns the full API surface", () => {
		const { teller } = getTestInstance();

		expect(Object.keys(teller.accounts).sort()).toEqual([
			"authenticate",
			"changePin",
			"create",
			"exists",
			"get",
			"getBalance",
			"verifyPin",
		]);
		expect(Object.keys(teller.transactions).sort()).toEqual(["deposit", "transfer", "withdraw"]);
		expect(teller.$context.options).toEqual({ currency: "INR", statementLimit: 10 });
	});

	it("loads the table from the store once at creation", () => {
		const store = createMemoryAccountStore();
		const load = vi.spyOn(store, "load");

		createTeller({ store, logger: silentLogger });

		expect(load).toHaveBeenCalledTimes(1);
	});

	it("accepts a store factory", () => {
		const store = createMemoryAccountStore();
		const teller = createTeller({ store: () => store, logger: silentLogger });
		expect(teller.$context.store).toBe(store);
	});

	it("rejects an unknown currency", () => {
		expect(() =>
			createTeller({ store: createMemoryAccountStore(), currency: "ZZZ", logger: silentLogger }),
		).toThrow(TellerError);
	});

	it("rejects a non-positive statement limit", () => {
		expect(() =>
			createTeller({ store: createMemoryAccountStore(), statementLimit: 0, logger: silentLogger }),
		).toThrow("Teller config: 'statementLimit' must be a positive integer");
	});

	it("formats money in the configured currency", () => {
		expect(getTestInstance().teller.formatMoney(520000)).toBe("₹5200.00");
		expect(getTestInstance({ currency: "USD" }).teller.formatMoney(1999)).toBe("$19.99");
	});
});

describe("seedDemoAccounts", () => {
	it("creates the two demo accounts on an empty table", () => {
		const { teller } = getTestInstance();

		const created = teller.seedDemoAccounts();

		expect(created.map((a) => [a.id, a.holderName, a.pin, a.balance])).toEqual([
			["1001", "Alice", "1234", 500000],
			["1002", "Bob", "2345", 300000],
		]);
		expect(teller.accounts.authenticate("1002", "2345").holderName).toBe("Bob");
	});

	it("scales opening balances to the currency precision", () => {
		const { teller } = getTestInstance({ currency: "JPY" });
		teller.seedDemoAccounts();
		expect(teller.accounts.getBalance("1001")).toBe(5000);
	});

	it("does nothing when accounts already exist", () => {
		const { teller, store } = getTestInstance();
		teller.accounts.create({ id: "42", holderName: "Zed", pin: "4242" });

		expect(teller.seedDemoAccounts()).toEqual([]);
		expect(teller.accounts.exists("1001")).toBe(false);
		expect(store.saveCount).toBe(1);
	});
});

describe("reload", () => {
	it("replaces the in-memory table with the persisted one", () => {
		const { teller, store } = getTestInstance();
		teller.accounts.create({ id: "1001", holderName: "Alice", pin: "1234", initialBalance: 100 });

		// Mutate without persisting, as a crashed session would leave it.
		teller.accounts.get("1001").balance = 999;
		teller.reload();

		expect(teller.accounts.getBalance("1001")).toBe(100);
		expect(store.saveCount).toBe(1);
	});

	it("picks up changes written by another writer", () => {
		const { teller, store } = getTestInstance();
		teller.accounts.create({ id: "1001", holderName: "Alice", pin: "1234" });

		const other = createTeller({ store, logger: silentLogger });
		other.transactions.deposit({ accountId: "1001", amount: "50" });

		expect(teller.accounts.getBalance("1001")).toBe(0);
		teller.reload();
		expect(teller.accounts.getBalance("1001")).toBe(5000);
	});
});
