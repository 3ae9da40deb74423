export { validateConfig } from "./config/index.js";
export { buildContext } from "./context/context.js";
export { DEMO_ACCOUNTS } from "./managers/demo-accounts.js";
export { formatStatementLine, formatTimestamp } from "./managers/statement-manager.js";
export type { AmountInput, TransferResult } from "./managers/transaction-manager.js";
export {
	createFileAccountStore,
	type FileAccountStore,
	type FileAccountStoreOptions,
} from "./store/file-store.js";
export {
	type AccountRecord,
	parseSnapshot,
	type Snapshot,
	serializeAccounts,
	type TransactionRecord,
	toSnapshot,
} from "./store/snapshot.js";
export { createTeller, type Teller } from "./teller/base.js";
