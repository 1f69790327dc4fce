import { describeLogEntry } from "../engine/index.js";
import type { LedgerStore } from "../storage/index.js";
import type { Currency, GroupStats, LogEntry } from "../types/index.js";
import { readLedger, updateLedger } from "./ledgerAccess.js";

export interface LogListing {
  index: number;
  description: string;
  entry: LogEntry;
}

export class GroupService {
  private store: LedgerStore;
  private defaultCurrency: Currency;

  constructor(store: LedgerStore, defaultCurrency: Currency = "EUR") {
    this.store = store;
    this.defaultCurrency = defaultCurrency;
  }

  async createGroup(name: string, members: string[], currency?: Currency): Promise<GroupStats> {
    return updateLedger(this.store, (ledger) =>
      ledger.createGroup(name, members, currency ?? this.defaultCurrency).stats()
    );
  }

  async listGroups(): Promise<{ groups: string[]; current: string | null }> {
    return readLedger(this.store, (ledger) => ({
      groups: ledger.groupNames(),
      current: ledger.current(),
    }));
  }

  async getStats(groupName?: string): Promise<GroupStats> {
    return updateLedger(this.store, (ledger) => ledger.select(ledger.getGroup(groupName).name).stats());
  }

  async addMembers(groupName: string | undefined, members: string[]): Promise<GroupStats> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.getGroup(groupName);
      group.addMembers(members);
      return group.stats();
    });
  }

  async removeMembers(
    groupName: string | undefined,
    members: string[],
    force = false
  ): Promise<GroupStats> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.getGroup(groupName);
      group.removeMembers(members, force);
      return group.stats();
    });
  }

  async deleteGroup(groupName: string): Promise<void> {
    await updateLedger(this.store, (ledger) => ledger.deleteGroup(groupName));
  }

  async listLog(groupName?: string): Promise<LogListing[]> {
    return updateLedger(this.store, (ledger) => {
      const group = ledger.select(ledger.getGroup(groupName).name);
      return group.entries().map((entry, index) => ({
        index,
        description: describeLogEntry(entry, group.currency),
        entry,
      }));
    });
  }
}
