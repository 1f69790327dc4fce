import { InvalidSemanticError } from "../errors.js";
import type { Money } from "../types/index.js";

/**
 * Split an amount among `among` slots as evenly as possible.
 * Leftover cents go one each to the first slots, in the direction of the
 * sign of `total`, so negative totals mirror positive ones.
 * @param total - Amount in cents, may be negative
 * @param among - Number of slots, must be > 0
 * @returns `among` shares summing to exactly `total`
 */
export function splitEqualAmong(total: Money, among: number): Money[] {
  if (!Number.isInteger(among) || among <= 0) {
    throw new InvalidSemanticError(`Cannot split among ${among} members`);
  }

  // `|| 0` keeps -0 out of the result
  const baseShare = Math.trunc(total / among) || 0;
  let remainder = total - baseShare * among;

  const shares: Money[] = new Array<Money>(among).fill(baseShare);

  for (let index = 0; remainder !== 0; index++) {
    const step = Math.sign(remainder);
    shares[index] += step;
    remainder -= step;
  }

  return shares;
}
