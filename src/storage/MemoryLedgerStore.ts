import { emptySnapshot } from "../ledger/Ledger.js";
import type { LedgerSnapshot } from "../types/index.js";
import type { LedgerStore } from "./LedgerStore.js";

export class MemoryLedgerStore implements LedgerStore {
  private snapshot: LedgerSnapshot;

  constructor(initial: LedgerSnapshot = emptySnapshot()) {
    this.snapshot = structuredClone(initial);
  }

  async load(): Promise<LedgerSnapshot> {
    return structuredClone(this.snapshot);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
  }
}
