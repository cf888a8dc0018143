/**
 * Set validator: the value (or every value, in multiple mode) must be one
 * of a fixed list of allowed items
 */

import type {
  CheckContext,
  CheckResult,
  Option,
} from "../../types/data-model.js";
import { RuleError } from "../../utils/errors.js";
import { compareOptionLabels } from "../../utils/format.js";
import { Validator } from "./base.js";
import type {
  Cardinality,
  InSetOptions,
  OptionComparator,
  SetItems,
} from "./types.js";

/**
 * String form used to compare values against the allowed items
 */
export function toToken(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

export function isEmptyValue(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * Normalize a multiple-mode value into a list
 */
export function toValueList(value: unknown): unknown[] {
  if (isEmptyValue(value)) return [];
  if (Array.isArray(value)) return value;
  return [value];
}

function isPairList(
  items: SetItems,
): items is readonly (readonly [unknown, unknown])[] {
  const first = items[0];
  return Array.isArray(first) && first.length === 2;
}

export class InSet extends Validator {
  readonly items: readonly string[];
  readonly labels: readonly string[] | undefined;
  readonly multiple: boolean | Cardinality;
  readonly zero: string | undefined;
  readonly sort: boolean | OptionComparator;

  constructor(items: SetItems, options: InSetOptions = {}) {
    super(options, "Value not allowed");

    if (isPairList(items)) {
      this.items = items.map(([item]) => String(item));
      this.labels = items.map(([, label]) => String(label));
    } else {
      this.items = items.map((item) => String(item));
      this.labels = options.labels;
    }

    if (this.labels && this.labels.length !== this.items.length) {
      throw new RuleError(
        `Expected ${this.items.length} labels, got ${this.labels.length}`,
        { items: this.items, labels: this.labels },
      );
    }

    const multiple = options.multiple ?? false;
    if (typeof multiple !== "boolean" && multiple[0] > multiple[1]) {
      throw new RuleError(
        `Invalid cardinality: minimum ${multiple[0]} exceeds maximum ${multiple[1]}`,
      );
    }

    this.multiple = multiple;
    this.zero = options.zero;
    this.sort = options.sort ?? false;
  }

  check(value: unknown, context: CheckContext = {}): CheckResult {
    if (this.multiple === false) {
      // A list never matches a single allowed item
      if (Array.isArray(value) && this.items.length > 0) {
        return this.fail(value, context);
      }
      if (this.items.length > 0 && !this.items.includes(toToken(value))) {
        return this.fail(value, context);
      }
      return this.pass(value);
    }

    // An empty selection normalizes to [] and has no membership failures
    const values = toValueList(value);
    const failures = values.filter((v) => !this.items.includes(toToken(v)));
    if (failures.length > 0 && this.items.length > 0) {
      return this.fail(value, context);
    }

    if (this.multiple !== true) {
      const [min, max] = this.multiple;
      if (!(min <= values.length && values.length < max)) {
        return this.fail(values, context);
      }
    }
    return this.pass(values);
  }

  options(includeZero = true): Option[] {
    const items: Option[] = this.items.map((key, index) => [
      key,
      this.labels?.[index] ?? key,
    ]);

    if (this.sort !== false) {
      // Array.prototype.sort is stable
      items.sort(this.sort === true ? compareOptionLabels : this.sort);
    }

    if (includeZero && this.zero !== undefined && this.multiple === false) {
      items.unshift(["", this.zero]);
    }
    return items;
  }
}
