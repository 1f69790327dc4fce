export { openDatabase, type LedgerDatabase } from "./db.js";
export * from "./schema.js";
export type { LedgerStore } from "./LedgerStore.js";
export { MemoryLedgerStore } from "./MemoryLedgerStore.js";
export { SqliteLedgerStore } from "./SqliteLedgerStore.js";
