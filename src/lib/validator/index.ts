/**
 * Validator module - range and set checks plus the check pipeline
 */

export * from "./types.js";
export { Validator } from "./base.js";
export {
  literal,
  deferred,
  resolveBound,
  compareValues,
  isComparable,
} from "./bound.js";
export { InRange } from "./in-range.js";
export { InSet, toToken, toValueList, isEmptyValue } from "./in-set.js";
export { runChecks } from "./pipeline.js";
