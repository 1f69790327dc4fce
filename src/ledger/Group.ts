import {
  InvalidNameError,
  InvalidNumberFormatError,
  InvalidSemanticError,
  LogEntryNotFoundError,
  MemberNotFoundError,
} from "../errors.js";
import { isValidName } from "../engine/targets.js";
import { splitIntoTransaction } from "../engine/allocate.js";
import { planSettlement, settlementToChange } from "../engine/settlement.js";
import type {
  Balance,
  Currency,
  GroupSnapshot,
  GroupStats,
  LogEntry,
  LoggedCommand,
  Money,
  Settlement,
  TransactionChange,
} from "../types/index.js";

function copyEntry(entry: LogEntry): LogEntry {
  return structuredClone(entry);
}

/**
 * A group of members with running balances and an undo log.
 * Member order is insertion order and drives every split.
 */
export class Group {
  readonly name: string;
  readonly currency: Currency;
  private members: Map<string, Money>;
  private log: LogEntry[];

  private constructor(
    name: string,
    currency: Currency,
    members: Map<string, Money>,
    log: LogEntry[]
  ) {
    this.name = name;
    this.currency = currency;
    this.members = members;
    this.log = log;
  }

  static create(name: string, memberNames: string[], currency: Currency = "EUR"): Group {
    if (memberNames.length === 0) {
      throw new InvalidSemanticError("Group must have at least one member");
    }

    const members = new Map<string, Money>();
    for (const member of memberNames) {
      if (!isValidName(member)) {
        throw new InvalidNameError(`Name '${member}' is not allowed for members`);
      }
      if (members.has(member)) {
        throw new InvalidNameError(`Member '${member}' is listed more than once`);
      }
      members.set(member, 0);
    }

    return new Group(name, currency, members, []);
  }

  static fromSnapshot(snapshot: GroupSnapshot): Group {
    return new Group(
      snapshot.name,
      snapshot.currency,
      new Map(snapshot.members.map((m): [string, Money] => [m.member, m.balance])),
      snapshot.log.map(copyEntry)
    );
  }

  toSnapshot(): GroupSnapshot {
    return {
      name: this.name,
      currency: this.currency,
      members: this.balances(),
      log: this.log.map(copyEntry),
    };
  }

  memberNames(): string[] {
    return [...this.members.keys()];
  }

  hasMember(name: string): boolean {
    return this.members.has(name);
  }

  balanceOf(name: string): Money {
    const balance = this.members.get(name);
    if (balance === undefined) {
      throw new MemberNotFoundError(`No member '${name}' in group '${this.name}'`);
    }
    return balance;
  }

  balances(): Balance[] {
    return [...this.members].map(([member, balance]) => ({ member, balance }));
  }

  stats(): GroupStats {
    return { name: this.name, currency: this.currency, members: this.balances() };
  }

  entries(): LogEntry[] {
    return this.log.map(copyEntry);
  }

  /**
   * Add `change` to the member balances. All keys are checked before any
   * balance is touched.
   */
  apply(change: TransactionChange): void {
    for (const name of Object.keys(change)) {
      if (!this.members.has(name)) {
        throw new MemberNotFoundError(`No member '${name}' in group '${this.name}'`);
      }
    }

    for (const [name, delta] of Object.entries(change)) {
      this.members.set(name, (this.members.get(name) ?? 0) + delta);
    }
  }

  /** Apply a change and append it to the log. */
  record(command: LoggedCommand, change: TransactionChange): LogEntry {
    this.apply(change);

    const entry: LogEntry = { command, change: { ...change }, createdAt: new Date() };
    this.log.push(entry);
    return entry;
  }

  /**
   * Allocate an expense across the group, apply it and log it.
   * @returns The applied balance deltas
   */
  split(
    amount: Money,
    from: string[],
    to: string[],
    name: string,
    balanceRest = false
  ): TransactionChange {
    const allocation = splitIntoTransaction(amount, this.memberNames(), from, to, balanceRest);

    this.record(
      {
        kind: "split",
        name,
        amount,
        from: allocation.from,
        to: allocation.to,
        directives: { from: [...from], to: [...to] },
        balanceRest,
      },
      allocation.change
    );

    return allocation.change;
  }

  /**
   * Record a direct payment: `from` handed `amount` to `to`.
   */
  pay(amount: Money, from: string, to: string): TransactionChange {
    if (!Number.isSafeInteger(amount)) {
      throw new InvalidNumberFormatError(`Amount must be a whole number of cents, got ${amount}`);
    }
    if (amount <= 0) {
      throw new InvalidSemanticError("A payment must be a positive amount");
    }
    if (!this.members.has(from) || !this.members.has(to)) {
      throw new MemberNotFoundError(`Either ${from} or ${to} does not exist within this group`);
    }
    if (from === to) {
      throw new InvalidSemanticError(`${from} cannot pay themselves`);
    }

    const change: TransactionChange = { [from]: amount, [to]: -amount };
    this.record({ kind: "pay", amount, from, to }, change);
    return change;
  }

  planSettlement(): Settlement[] {
    return planSettlement(this.balances());
  }

  applySettlement(transactions: Settlement[]): TransactionChange {
    for (const transaction of transactions) {
      if (!Number.isSafeInteger(transaction.amount) || transaction.amount <= 0) {
        throw new InvalidSemanticError(
          `Settlement amounts must be positive whole cents, got ${transaction.amount}`
        );
      }
      if (transaction.from === transaction.to) {
        throw new InvalidSemanticError(`${transaction.from} cannot settle with themselves`);
      }
    }

    const change = settlementToChange(transactions);
    this.record({ kind: "settle", transactions: transactions.map((t) => ({ ...t })) }, change);
    return change;
  }

  private resolveIndex(index?: number): number {
    if (this.log.length === 0) {
      throw new LogEntryNotFoundError("The log is empty");
    }

    const resolved = index ?? this.log.length - 1;
    if (!Number.isInteger(resolved) || resolved < 0 || resolved >= this.log.length) {
      throw new LogEntryNotFoundError(`No log entry with index ${resolved}`);
    }
    return resolved;
  }

  getLog(index?: number): LogEntry {
    return copyEntry(this.log[this.resolveIndex(index)]);
  }

  /**
   * Reverse a logged change and drop it from the log.
   * @param index - Position in the log, defaults to the last entry
   * @returns The removed entry
   */
  undo(index?: number): LogEntry {
    const resolved = this.resolveIndex(index);
    const entry = this.log[resolved];

    const reversed: TransactionChange = {};
    for (const [name, delta] of Object.entries(entry.change)) {
      reversed[name] = -delta;
    }

    this.apply(reversed);
    this.log.splice(resolved, 1);
    return entry;
  }

  addMembers(names: string[]): void {
    const duplicates: string[] = [];
    const invalid: string[] = [];
    const seen = new Set<string>();

    for (const name of names) {
      if (this.members.has(name) || seen.has(name)) {
        duplicates.push(name);
      } else if (!isValidName(name)) {
        invalid.push(name);
      }
      seen.add(name);
    }

    if (duplicates.length > 0 || invalid.length > 0) {
      throw new InvalidNameError(
        `duplicates: [${duplicates.join(", ")}], invalid names: [${invalid.join(", ")}]`
      );
    }

    for (const name of names) {
      this.members.set(name, 0);
    }
  }

  /**
   * Remove members. Members with an open balance are only removed with
   * `force`.
   */
  removeMembers(names: string[], force = false): void {
    const rejected = names.filter((name) => {
      const balance = this.members.get(name);
      return balance === undefined || (balance !== 0 && !force);
    });

    if (rejected.length > 0) {
      throw new InvalidNameError(
        `Could not remove [${rejected.join(", ")}]: they either have an open balance or are not in the group`
      );
    }

    for (const name of names) {
      this.members.delete(name);
    }
  }
}
