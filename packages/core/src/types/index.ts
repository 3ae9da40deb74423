export type { Account, AccountMap, Session } from "./account.js";
export type { LogLevel, TellerLogger, TellerOptions } from "./config.js";
export type { ResolvedTellerOptions, TellerContext } from "./context.js";
export type { AccountStore } from "./store.js";
export type { Transaction, TransactionKind } from "./transaction.js";
export { TRANSACTION_KIND_LABELS, TRANSACTION_KINDS } from "./transaction.js";
