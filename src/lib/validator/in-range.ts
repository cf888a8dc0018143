/**
 * Range validator: the value must lie within an optional bound pair
 */

import type {
  Bound,
  CheckContext,
  CheckResult,
  Comparable,
} from "../../types/data-model.js";
import { interpolate } from "../../utils/format.js";
import { Validator } from "./base.js";
import { compareValues, isComparable, resolveBound } from "./bound.js";
import type { InRangeOptions } from "./types.js";

export class InRange<T extends Comparable = Comparable> extends Validator {
  readonly minimum: Bound<T> | undefined;
  readonly maximum: Bound<T> | undefined;
  readonly include: readonly [boolean, boolean];

  constructor(options: InRangeOptions<T> = {}) {
    super(options);
    this.minimum = options.minimum;
    this.maximum = options.maximum;
    this.include = options.include ?? [true, false];
  }

  check(value: unknown, context: CheckContext = {}): CheckResult {
    const minimum = this.minimum ? resolveBound(this.minimum) : undefined;
    const maximum = this.maximum ? resolveBound(this.maximum) : undefined;

    if (
      (minimum === undefined || this.above(value, minimum, this.include[0])) &&
      (maximum === undefined || this.below(value, maximum, this.include[1]))
    ) {
      return this.pass(value);
    }
    return { value, error: this.rangeError(minimum, maximum, context) };
  }

  private above(value: unknown, bound: T, inclusive: boolean): boolean {
    if (!isComparable(value)) return false;
    const order = compareValues(value, bound);
    if (order === undefined) return false;
    return inclusive ? order >= 0 : order > 0;
  }

  private below(value: unknown, bound: T, inclusive: boolean): boolean {
    if (!isComparable(value)) return false;
    const order = compareValues(value, bound);
    if (order === undefined) return false;
    return inclusive ? order <= 0 : order < 0;
  }

  private rangeError(
    minimum: T | undefined,
    maximum: T | undefined,
    context: CheckContext,
  ): string {
    let message = this.message;
    if (message === undefined) {
      message = "Enter a value";
      if (minimum !== undefined && maximum !== undefined) {
        message += " between {min} and {max}";
      } else if (minimum !== undefined) {
        message += " greater than or equal to {min}";
      } else if (maximum !== undefined) {
        message += " less than or equal to {max}";
      }
    }

    // Integer maxima are shown as the last accepted integer, whatever the
    // inclusivity flag says
    let shownMaximum: unknown = maximum;
    if (typeof maximum === "number" && Number.isInteger(maximum)) {
      shownMaximum = maximum - 1;
    } else if (typeof maximum === "bigint") {
      shownMaximum = maximum - 1n;
    }

    return interpolate(this.translate(message, context), {
      min: minimum,
      max: shownMaximum,
    });
  }
}
