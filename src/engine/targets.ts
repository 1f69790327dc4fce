import {
  InvalidNameError,
  InvalidNumberFormatError,
  InvalidSemanticError,
  InvalidTargetFormatError,
} from "../errors.js";
import type { Money, ParsedTargets, Target } from "../types/index.js";

export const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_\-()]*$/;

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:[.,]\d*)?|[.,]\d+)$/;

export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Round half away from zero, so that 0.5 -> 1 and -0.5 -> -1.
 */
export function roundHalfAwayFromZero(value: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value))) || 0;
}

function parseNumber(raw: string, directive: string): number {
  const text = raw.trim();
  if (!NUMBER_PATTERN.test(text)) {
    throw new InvalidNumberFormatError(
      `Please specify a valid number as amount for '${directive}'`
    );
  }
  return Number(text.replace(",", "."));
}

/**
 * Parse a single directive of the form `<name>` or `<name>:<number>[%]`.
 * Plain numbers are major units (`25,22` -> 2522 cents), percentages are
 * taken of `totalAmount`.
 */
export function parseTarget(directive: string, totalAmount: Money): Target {
  const parts = directive.split(":");

  if (parts.length > 2 || parts[0] === "") {
    throw new InvalidTargetFormatError(
      `Please use the format <name>[:<number>[%]], got '${directive}'`
    );
  }

  const member = parts[0];

  if (!isValidName(member)) {
    throw new InvalidNameError(`'${member}' is not a valid member name`);
  }

  if (parts.length === 1) {
    return { member, amount: null };
  }

  const trimmed = parts[1].trim();

  if (trimmed.endsWith("%")) {
    const percent = parseNumber(trimmed.slice(0, -1), directive);
    return { member, amount: roundHalfAwayFromZero((percent * totalAmount) / 100) };
  }

  const major = parseNumber(trimmed, directive);
  return { member, amount: roundHalfAwayFromZero(major * 100) };
}

/**
 * Parse a list of directives, summing the explicit amounts and counting
 * wildcards.
 * @throws InvalidSemanticError if the explicit amounts exceed the total
 */
export function parseTargets(directives: string[], totalAmount: Money): ParsedTargets {
  const targets: Target[] = [];
  let explicitSum = 0;
  let wildcardCount = 0;

  for (const directive of directives) {
    const target = parseTarget(directive, totalAmount);
    targets.push(target);

    if (target.amount === null) {
      wildcardCount += 1;
    } else {
      explicitSum += target.amount;
    }
  }

  if (Math.abs(explicitSum) > totalAmount) {
    throw new InvalidSemanticError(
      `The specified amounts sum up to more than the total amount: ${explicitSum} vs ${totalAmount}`
    );
  }

  return { targets, explicitSum, wildcardCount };
}
