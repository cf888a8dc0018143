/**
 * Bounds that are fixed at construction or computed when a check runs
 */

import type { Bound, Comparable } from "../../types/data-model.js";

export function literal<T>(value: T): Bound<T> {
  return { kind: "literal", value };
}

/**
 * A bound evaluated on every check, e.g. `deferred(() => new Date())`
 */
export function deferred<T>(resolve: () => T): Bound<T> {
  return { kind: "deferred", resolve };
}

export function resolveBound<T>(bound: Bound<T>): T {
  switch (bound.kind) {
    case "literal":
      return bound.value;
    case "deferred":
      return bound.resolve();
  }
}

export function isComparable(value: unknown): value is Comparable {
  return (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string" ||
    value instanceof Date
  );
}

/**
 * Compare two comparable values. Numbers and bigints compare with each
 * other, strings with strings, dates by timestamp. Returns undefined for
 * any other pairing or when either side is NaN.
 */
export function compareValues(a: Comparable, b: Comparable): number | undefined {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (a instanceof Date !== b instanceof Date) {
    return undefined;
  }

  if (typeof left === "string" || typeof right === "string") {
    if (typeof left !== "string" || typeof right !== "string") {
      return undefined;
    }
    return left < right ? -1 : left > right ? 1 : 0;
  }

  if (left < right) return -1;
  if (left > right) return 1;
  // NaN compares neither less, greater nor equal
  return left == right ? 0 : undefined;
}
