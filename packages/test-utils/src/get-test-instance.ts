import type { AccountMap, TellerLogger } from "@atm-teller/core";
import { createMemoryAccountStore, type MemoryAccountStore } from "@atm-teller/memory-store";
import { createTeller, type Teller } from "@atm-teller/teller";

export interface TestInstanceOptions {
	/** Table the store starts with. Default: empty */
	accounts?: AccountMap;
	/** Currency. Default: "INR" */
	currency?: string;
	/** First clock reading. Default: 2026-01-15 09:30:00 local time */
	start?: Date;
	/** Logger. Default: silent */
	logger?: TellerLogger;
}

export interface TestInstance {
	/** The teller instance */
	teller: Teller;
	/** The memory store behind it */
	store: MemoryAccountStore;
	/** Clock readings handed out so far, in order */
	ticks: Date[];
}

export const silentLogger: TellerLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

/**
 * Clock that starts at `start` and moves forward one second per reading,
 * so consecutive ledger entries get distinct, predictable timestamps.
 */
export function createTestClock(start: Date, ticks: Date[] = []): () => Date {
	let next = start.getTime();
	return () => {
		const reading = new Date(next);
		next += 1000;
		ticks.push(reading);
		return reading;
	};
}

export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const store = createMemoryAccountStore(options.accounts);
	const ticks: Date[] = [];
	const teller = createTeller({
		store,
		currency: options.currency ?? "INR",
		clock: createTestClock(options.start ?? new Date(2026, 0, 15, 9, 30, 0), ticks),
		logger: options.logger ?? silentLogger,
	});

	return { teller, store, ticks };
}
