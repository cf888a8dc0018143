/**
 * Rules module types - the declarative rules document
 */

import type { SortDirection } from "../../types/data-model.js";

export type ScalarValue = string | number;

export interface RangeRule {
  min?: ScalarValue;
  max?: ScalarValue;
  include?: [boolean, boolean];
  message?: string;
}

export interface SetRule {
  items?: ScalarValue[];
  pairs?: [ScalarValue, string][];
  labels?: string[];
  multiple?: boolean | [number, number];
  zero?: string;
  sort?: boolean;
  message?: string;
}

export interface ExistsRule {
  table: string;
  field?: string;
  labelField?: string;
  multiple?: boolean;
  orderBy?: [string, SortDirection][];
  zero?: string;
  message?: string;
}

export interface AbsentRule {
  table: string;
  field?: string;
  message?: string;
}

/**
 * One validator on a field; exactly one key is present
 */
export type RuleEntry =
  | { range: RangeRule }
  | { set: SetRule }
  | { exists: ExistsRule }
  | { absent: AbsentRule };

/**
 * Store section of a rules document; CLI flags and environment may
 * complete or override it
 */
export interface StoreSection {
  uri?: string;
  database?: string;
  idField?: string;
  /** "{field}" display templates keyed by table */
  formats?: Record<string, string>;
}

export interface RulesDocument {
  store?: StoreSection;
  fields: Record<string, RuleEntry[]>;
}
