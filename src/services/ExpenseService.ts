import type { LedgerStore } from "../storage/index.js";
import type { LogEntry, Money, TransactionChange } from "../types/index.js";
import { updateLedger } from "./ledgerAccess.js";

export class ExpenseService {
  private store: LedgerStore;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  /**
   * Split an expense across a group, apply it and log it.
   * Nothing is saved when the directives are rejected.
   */
  async allocateExpense(params: {
    group?: string;
    amountCents: Money;
    from: string[];
    to?: string[];
    name: string;
    balanceRest?: boolean;
  }): Promise<TransactionChange> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.getGroup(params.group);
      const change = group.split(
        params.amountCents,
        params.from,
        params.to ?? [],
        params.name,
        params.balanceRest ?? false
      );
      ledger.select(group.name);
      return change;
    });
  }

  async recordPayment(params: {
    group?: string;
    amountCents: Money;
    from: string;
    to: string;
  }): Promise<TransactionChange> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.getGroup(params.group);
      const change = group.pay(params.amountCents, params.from, params.to);
      ledger.select(group.name);
      return change;
    });
  }

  /**
   * Reverse a log entry (the latest one by default) and remove it.
   * @returns The removed entry
   */
  async undo(groupName?: string, index?: number): Promise<LogEntry> {
    return updateLedger(this.store, (ledger) => ledger.getGroup(groupName).undo(index));
  }
}
