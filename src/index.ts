import type { Group } from "./ledger/Group.js";
import type { Ledger } from "./ledger/Ledger.js";
import type { Currency, Money, Settlement, TransactionChange } from "./types/index.js";

export * from "./types/index.js";
export * from "./errors.js";
export * from "./engine/index.js";
export { Group } from "./ledger/Group.js";
export { Ledger, LEDGER_VERSION, emptySnapshot } from "./ledger/Ledger.js";
export * from "./storage/index.js";
export * from "./services/index.js";

export function createGroup(
  ledger: Ledger,
  name: string,
  members: string[],
  currency?: Currency
): Group {
  return ledger.createGroup(name, members, currency);
}

export function allocateExpense(
  group: Group,
  totalAmount: Money,
  from: string[],
  to: string[],
  balanceRest = false,
  name = ""
): TransactionChange {
  return group.split(totalAmount, from, to, name, balanceRest);
}

export function recordPayment(group: Group, amount: Money, from: string, to: string): void {
  group.pay(amount, from, to);
}

export function undo(group: Group, index?: number): void {
  group.undo(index);
}

export function planGroupSettlement(group: Group): Settlement[] {
  return group.planSettlement();
}

export function applySettlement(group: Group, transactions: Settlement[]): void {
  group.applySettlement(transactions);
}
