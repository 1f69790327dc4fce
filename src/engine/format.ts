import type { Currency, LogEntry, Money, Target } from "../types/index.js";

const SYMBOLS: Record<Currency, string> = {
  EUR: "€",
  USD: "$",
  GBP: "£",
  JPY: "¥",
};

// minor units per major unit
const SUBDIVISION: Record<Currency, number> = {
  EUR: 100,
  USD: 100,
  GBP: 100,
  JPY: 100,
};

/**
 * Format cents as a major-unit amount, e.g. `-1250` -> `"-12.50 €"`.
 */
export function formatMoney(amount: Money, currency: Currency): string {
  const subdivision = SUBDIVISION[currency];
  const digits = String(subdivision - 1).length;
  const magnitude = Math.abs(amount);
  const major = Math.trunc(magnitude / subdivision);
  const minor = String(magnitude % subdivision).padStart(digits, "0");
  const sign = amount < 0 ? "-" : "";

  return `${sign}${major}.${minor} ${SYMBOLS[currency]}`;
}

function describeTarget(target: Target, currency: Currency): string {
  return target.amount === null
    ? `${target.member}: *`
    : `${target.member}: ${formatMoney(target.amount, currency)}`;
}

export function describeLogEntry(entry: LogEntry, currency: Currency): string {
  const command = entry.command;

  switch (command.kind) {
    case "pay":
      return `pay: ${command.from} to ${command.to}: ${formatMoney(command.amount, currency)}`;

    case "split": {
      const from = command.from.map((t) => describeTarget(t, currency)).join(", ");
      const to = command.to.map((t) => describeTarget(t, currency)).join(", ");

      let line = `split: ${command.name} ${formatMoney(command.amount, currency)} paid by ${from}`;
      if (to) {
        line += `, to ${to}`;
      }
      if (command.balanceRest) {
        line += ", balancing the rest";
      }
      return line;
    }

    case "settle":
      if (command.transactions.length === 0) {
        return "settle: nothing to settle";
      }
      return `settle: ${command.transactions
        .map((s) => `${s.from} to ${s.to}: ${formatMoney(s.amount, currency)}`)
        .join("; ")}`;
  }
}
