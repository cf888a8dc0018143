/**
 * Message and label formatting helpers
 */

import type { DisplayFormat, Option, Row } from "../types/data-model.js";

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Replace `{name}` placeholders with the matching value.
 * Unknown placeholders are left in place.
 *
 * @example
 * interpolate("between {min} and {max}", { min: 1, max: 9 }); // "between 1 and 9"
 */
export function interpolate(
  template: string,
  values: Record<string, unknown>,
): string {
  return template.replace(PLACEHOLDER, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key)
      ? String(values[key])
      : match,
  );
}

/**
 * Render a row through a table display format
 */
export function renderRow(format: DisplayFormat, row: Row): string {
  return typeof format === "function" ? format(row) : interpolate(format, row);
}

/**
 * Default option ordering: case-insensitive by label
 */
export function compareOptionLabels<K>(a: Option<K>, b: Option<K>): number {
  const left = a[1].toUpperCase();
  const right = b[1].toUpperCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
