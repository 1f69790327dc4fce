export { splitEqualAmong } from "./split.js";
export {
  NAME_PATTERN,
  isValidName,
  parseTarget,
  parseTargets,
  roundHalfAwayFromZero,
} from "./targets.js";
export { splitIntoTransaction } from "./allocate.js";
export { planSettlement, settlementToChange } from "./settlement.js";
export { describeLogEntry, formatMoney } from "./format.js";
