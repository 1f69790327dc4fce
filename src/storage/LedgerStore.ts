import type { LedgerSnapshot } from "../types/index.js";

/**
 * Whole-state persistence: the ledger is loaded once per operation and
 * written back in full afterwards.
 */
export interface LedgerStore {
  load(): Promise<LedgerSnapshot>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}
