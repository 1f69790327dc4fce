import type { LedgerStore } from "../storage/index.js";
import type { Balance, Settlement, TransactionChange } from "../types/index.js";
import { readLedger, updateLedger } from "./ledgerAccess.js";

export class BalanceService {
  private store: LedgerStore;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  async getBalances(groupName?: string): Promise<Balance[]> {
    return readLedger(this.store, (ledger) => ledger.getGroup(groupName).balances());
  }

  async planSettlement(groupName?: string): Promise<Settlement[]> {
    return readLedger(this.store, (ledger) => ledger.getGroup(groupName).planSettlement());
  }

  /**
   * Apply payments that were confirmed by the caller, usually the result
   * of `planSettlement`.
   */
  async applySettlement(
    groupName: string | undefined,
    transactions: Settlement[]
  ): Promise<TransactionChange> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.getGroup(groupName);
      const change = group.applySettlement(transactions);
      ledger.select(group.name);
      return change;
    });
  }
}
