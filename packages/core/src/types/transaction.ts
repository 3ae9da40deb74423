export type TransactionKind =
	| "created"
	| "deposit"
	| "withdrawal"
	| "transfer_out"
	| "transfer_in"
	| "pin_change";

export const TRANSACTION_KINDS = [
	"created",
	"deposit",
	"withdrawal",
	"transfer_out",
	"transfer_in",
	"pin_change",
] as const satisfies readonly TransactionKind[];

/** Human-readable label for each kind, as shown on a mini statement. */
export const TRANSACTION_KIND_LABELS: Record<TransactionKind, string> = {
	created: "Account Created",
	deposit: "Deposit",
	withdrawal: "Withdrawal",
	transfer_out: "Transfer Out",
	transfer_in: "Transfer In",
	pin_change: "PIN Change",
};

/** One immutable ledger entry. */
export interface Transaction {
	timestamp: Date;
	kind: TransactionKind;
	/** Amount in smallest units (paise/cents). Zero for markers. */
	amount: number;
	remark: string;
	/** Account balance in smallest units immediately after this entry was applied */
	balanceAfter: number;
}
