/**
 * Validator module types
 */

import type { Bound, Comparable, Option } from "../../types/data-model.js";

export interface ValidatorOptions {
  /** Failure message; passed through the translation hook */
  message?: string;
}

export interface InRangeOptions<T extends Comparable> extends ValidatorOptions {
  minimum?: Bound<T>;
  maximum?: Bound<T>;
  /** Boundary inclusivity as [includeMin, includeMax] */
  include?: readonly [boolean, boolean];
}

/**
 * Cardinality bound [min, max) on the number of selected values
 */
export type Cardinality = readonly [min: number, max: number];

export type OptionComparator = (a: Option, b: Option) => number;

export interface InSetOptions extends ValidatorOptions {
  labels?: readonly string[];
  multiple?: boolean | Cardinality;
  /** Label of the empty option prepended by options() */
  zero?: string;
  /** true sorts options by label; a function supplies the ordering */
  sort?: boolean | OptionComparator;
}

/**
 * Allowed items, either plain or as [item, label] pairs
 */
export type SetItems = readonly unknown[] | readonly (readonly [unknown, unknown])[];
