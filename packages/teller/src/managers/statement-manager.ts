import type { TellerContext, Transaction } from "@atm-teller/core";
import { formatMoney, TellerError, TRANSACTION_KIND_LABELS } from "@atm-teller/core";
import { requireAccount } from "./ledger-helpers.js";

/** Last `limit` ledger entries, oldest first. Empty when the ledger is empty. */
export function getMiniStatement(
	ctx: TellerContext,
	accountId: string,
	limit: number = ctx.options.statementLimit,
): Transaction[] {
	if (!Number.isInteger(limit) || limit < 1) {
		throw TellerError.invalidArgument("Statement limit must be a positive integer.");
	}
	const account = requireAccount(ctx, accountId);
	return account.ledger.slice(-limit);
}

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
	const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
	return `${day} ${time}`;
}

/**
 * One statement row:
 * `2026-01-15 09:30:00 | Deposit      | ₹200.00 | Bal: ₹5200.00 | Cash deposit`
 */
export function formatStatementLine(tx: Transaction, currency = "INR"): string {
	return [
		formatTimestamp(tx.timestamp),
		TRANSACTION_KIND_LABELS[tx.kind].padEnd(12),
		formatMoney(tx.amount, currency),
		`Bal: ${formatMoney(tx.balanceAfter, currency)}`,
		tx.remark,
	].join(" | ");
}
