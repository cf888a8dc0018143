/**
 * Core data model types for fieldcheck
 * Every check takes one value plus an optional context and returns a CheckResult
 */

/**
 * Passes a human-readable message through an external localization function
 */
export type Translator = (message: string) => string;

/**
 * CheckResult - the (possibly transformed) value and the failure message, if any
 */
export interface CheckResult<T = unknown> {
  value: T;
  error: string | null;
}

/**
 * CheckContext - request-scoped state threaded into every check
 */
export interface CheckContext {
  translate?: Translator;
  /** Id of the record being updated; exempts it from absence checks */
  editingRecordId?: RowId | null;
}

/**
 * FieldCheck - anything that can validate a single value
 */
export interface FieldCheck {
  check(
    value: unknown,
    context?: CheckContext,
  ): CheckResult | Promise<CheckResult>;
}

/**
 * OptionSource - checks that can list the values they accept
 */
export interface OptionSource {
  options(includeZero?: boolean): Option<string | number>[] | Promise<Option<string | number>[]>;
}

/**
 * Option - a (key, label) pair for presenting allowed values
 */
export type Option<K = string> = readonly [key: K, label: string];

/**
 * Bound - a literal value or one produced at check time (e.g. "now")
 */
export type Bound<T> =
  | { kind: "literal"; value: T }
  | { kind: "deferred"; resolve: () => T };

export type Comparable = number | bigint | string | Date;

// Record store values

export type RowId = string | number;

export interface Row {
  id: RowId;
  [field: string]: unknown;
}

export type SortDirection = 1 | -1;

/**
 * SortSpec - ordered list of [field name, direction] pairs
 */
export type SortSpec = Array<[field: string, direction: SortDirection]>;

/**
 * DisplayFormat - "{field}" template or a function rendering a row
 */
export type DisplayFormat = string | ((row: Row) => string);
