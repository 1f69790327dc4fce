// All amounts are in INTEGER minor units (cents)
export type Money = number;

export type Currency = "EUR" | "USD" | "GBP" | "JPY";

export const CURRENCIES = ["EUR", "USD", "GBP", "JPY"] as const satisfies readonly Currency[];

/**
 * A parsed `--from`/`--to` style directive.
 * `amount === null` marks a wildcard: the share is resolved later by
 * splitting whatever is left equally.
 */
export interface Target {
  member: string;
  amount: Money | null;
}

export interface ParsedTargets {
  targets: Target[];
  explicitSum: Money; // sum of all non-wildcard amounts
  wildcardCount: number;
}

// member name -> signed delta (cents); values sum to 0
export type TransactionChange = Record<string, Money>;

export interface Allocation {
  change: TransactionChange;
  from: Target[];
  to: Target[];
}

export interface Settlement {
  from: string; // member paying
  to: string; // member receiving
  amount: Money; // cents, always > 0
}

export interface Balance {
  member: string;
  balance: Money; // positive = owed money, negative = owes money (cents)
}

export type LoggedCommand =
  | {
      kind: "split";
      name: string;
      amount: Money;
      from: Target[];
      to: Target[];
      directives: { from: string[]; to: string[] };
      balanceRest: boolean;
    }
  | {
      kind: "pay";
      amount: Money;
      from: string;
      to: string;
    }
  | {
      kind: "settle";
      transactions: Settlement[];
    };

export interface LogEntry {
  command: LoggedCommand;
  change: TransactionChange;
  createdAt: Date;
}

export interface GroupStats {
  name: string;
  currency: Currency;
  members: Balance[];
}

export interface GroupSnapshot {
  name: string;
  currency: Currency;
  members: Balance[];
  log: LogEntry[];
}

export interface LedgerSnapshot {
  version: string;
  groups: GroupSnapshot[];
  currentGroup: string | null;
}
