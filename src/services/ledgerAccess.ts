import { Ledger } from "../ledger/Ledger.js";
import type { LedgerStore } from "../storage/index.js";

export async function readLedger<T>(store: LedgerStore, read: (ledger: Ledger) => T): Promise<T> {
  return read(Ledger.fromSnapshot(await store.load()));
}

/**
 * Load the ledger, run `mutate`, and save only if it returns without
 * throwing.
 */
export async function updateLedger<T>(
  store: LedgerStore,
  mutate: (ledger: Ledger) => T
): Promise<T> {
  const ledger = Ledger.fromSnapshot(await store.load());
  const result = mutate(ledger);
  await store.save(ledger.toSnapshot());
  return result;
}
