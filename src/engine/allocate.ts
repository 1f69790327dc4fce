import {
  InvalidNumberFormatError,
  InvalidSemanticError,
  InvalidTargetFormatError,
  MemberNotFoundError,
} from "../errors.js";
import type { Allocation, Money, Target, TransactionChange } from "../types/index.js";
import { splitEqualAmong } from "./split.js";
import { parseTargets } from "./targets.js";

function assertUnique(targets: Target[], side: "from" | "to"): void {
  const seen = new Set<string>();
  for (const target of targets) {
    if (seen.has(target.member)) {
      throw new InvalidSemanticError(
        `Member '${target.member}' is named more than once in '${side}'`
      );
    }
    seen.add(target.member);
  }
}

/**
 * Turn an expense into per-member balance deltas.
 *
 * The `from` members fronted `totalAmount`: explicit amounts are credited as
 * given, wildcard payers split whatever is left. The `to` members consumed
 * their explicit amounts; the rest of the bill is split equally among the
 * members not named in `to`, or among everyone when `balanceRest` is set.
 *
 * Nothing is mutated here; the caller applies `change` to the group.
 * @param totalAmount - Expense total in cents
 * @param members - Group member names, in group order
 * @param from - Payer directives, e.g. `["Alice", "Bob:12,50"]`
 * @param to - Receiver directives, each with an explicit amount
 * @param balanceRest - Whether `to` members also share the remainder
 */
export function splitIntoTransaction(
  totalAmount: Money,
  members: string[],
  from: string[],
  to: string[],
  balanceRest: boolean
): Allocation {
  if (!Number.isSafeInteger(totalAmount)) {
    throw new InvalidNumberFormatError(`Amount must be a whole number of cents, got ${totalAmount}`);
  }
  if (from.length === 0) {
    throw new InvalidSemanticError("An expense needs at least one 'from' directive");
  }

  const givers = parseTargets(from, totalAmount);
  const receivers = parseTargets(to, totalAmount);

  if (receivers.targets.some((target) => target.amount === null)) {
    throw new InvalidTargetFormatError("Amounts for 'to' must be specified explicitly");
  }
  if (givers.wildcardCount === 0 && givers.explicitSum !== totalAmount) {
    throw new InvalidSemanticError(
      `Amounts of 'from' must either contain a wildcard or add up to the total: ${givers.explicitSum} vs ${totalAmount}`
    );
  }

  assertUnique(givers.targets, "from");
  assertUnique(receivers.targets, "to");

  const memberSet = new Set(members);
  for (const target of [...givers.targets, ...receivers.targets]) {
    if (!memberSet.has(target.member)) {
      throw new MemberNotFoundError(`No member '${target.member}' in this group`);
    }
  }

  const sharers = balanceRest ? members.length : members.length - receivers.targets.length;
  const rest = totalAmount - receivers.explicitSum;
  if (sharers === 0 && rest !== 0) {
    throw new InvalidSemanticError(
      "Every member has an explicit share, nobody is left to take the remaining amount"
    );
  }

  const giverShares =
    givers.wildcardCount > 0
      ? splitEqualAmong(totalAmount - givers.explicitSum, givers.wildcardCount)
      : [];
  const restShares = sharers > 0 ? splitEqualAmong(rest, sharers) : [];

  const giverByName = new Map(givers.targets.map((t): [string, Target] => [t.member, t]));
  const receiverByName = new Map(receivers.targets.map((t): [string, Target] => [t.member, t]));

  const change: TransactionChange = {};
  let giverIndex = 0;
  let restIndex = 0;

  // Positive leg: who fronted the money
  for (const member of members) {
    const giver = giverByName.get(member);
    if (!giver) {
      change[member] = 0;
    } else if (giver.amount === null) {
      change[member] = giverShares[giverIndex++];
    } else {
      change[member] = giver.amount;
    }
  }

  // Negative leg: who consumed the expense
  for (const member of members) {
    const receiver = receiverByName.get(member);
    if (receiver) {
      change[member] -= receiver.amount ?? 0;
      if (balanceRest) {
        change[member] -= restShares[restIndex++];
      }
    } else {
      change[member] -= restShares[restIndex++];
    }
  }

  return { change, from: givers.targets, to: receivers.targets };
}
