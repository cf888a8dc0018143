/**
 * Run several checks over one value
 */

import type {
  CheckContext,
  CheckResult,
  FieldCheck,
} from "../../types/data-model.js";

/**
 * Apply checks in order, feeding each the value returned by the previous
 * one. Stops at the first failure; store errors propagate.
 */
export async function runChecks(
  value: unknown,
  checks: readonly FieldCheck[],
  context: CheckContext = {},
): Promise<CheckResult> {
  let current = value;
  for (const validator of checks) {
    const result = await validator.check(current, context);
    if (result.error !== null) {
      return result;
    }
    current = result.value;
  }
  return { value: current, error: null };
}
