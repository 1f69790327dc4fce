import type { Balance, Settlement, TransactionChange } from "../types/index.js";

/**
 * Compute the payments that zero out all balances (greedy algorithm).
 *
 * Debtors first look for a creditor owed exactly their debt; whatever is
 * left is then matched smallest-first with two cursors. Not guaranteed to
 * be the global minimum, but deterministic for a given member order.
 * @param balances - Balances summing to 0
 * @returns Settlements in debtor/creditor cursor order
 */
export function planSettlement(balances: Balance[]): Settlement[] {
  // Working copies; Array.prototype.sort is stable so ties keep group order
  const creditors = balances
    .filter((b) => b.balance > 0)
    .map((b) => ({ ...b }))
    .sort((a, b) => a.balance - b.balance);
  const debtors = balances
    .filter((b) => b.balance < 0)
    .map((b) => ({ ...b }))
    .sort((a, b) => Math.abs(a.balance) - Math.abs(b.balance));

  const settlements: Settlement[] = [];

  // Exact matches
  for (const debtor of debtors) {
    for (const creditor of creditors) {
      if (-debtor.balance < creditor.balance) {
        break;
      }
      if (debtor.balance === -creditor.balance) {
        settlements.push({ from: debtor.member, to: creditor.member, amount: creditor.balance });
        debtor.balance = 0;
        creditor.balance = 0;
        break;
      }
    }
  }

  // Remainder
  let creditorIndex = 0;
  for (const debtor of debtors) {
    while (debtor.balance < 0) {
      while (creditorIndex < creditors.length && creditors[creditorIndex].balance === 0) {
        creditorIndex++;
      }
      if (creditorIndex >= creditors.length) {
        return settlements;
      }

      const creditor = creditors[creditorIndex];
      const amount = Math.min(-debtor.balance, creditor.balance);

      settlements.push({ from: debtor.member, to: creditor.member, amount });
      debtor.balance += amount;
      creditor.balance -= amount;
    }
  }

  return settlements;
}

/**
 * Turn a list of payments into balance deltas: the payer's balance goes
 * up, the receiver's goes down.
 */
export function settlementToChange(settlements: Settlement[]): TransactionChange {
  // Member names such as "constructor" collide with Object.prototype keys
  const change = new Map<string, number>();

  for (const settlement of settlements) {
    change.set(settlement.from, (change.get(settlement.from) ?? 0) + settlement.amount);
    change.set(settlement.to, (change.get(settlement.to) ?? 0) - settlement.amount);
  }

  return Object.fromEntries(change);
}
