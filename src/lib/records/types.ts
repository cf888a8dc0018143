/**
 * Record check module types
 */

import type { SortSpec } from "../../types/data-model.js";
import type { RecordQuery, RecordStore, RecordTable } from "../store/types.js";
import type { ValidatorOptions } from "../validator/types.js";

/**
 * Builds the filtered query-set the checks run against
 */
export type QueryFactory = (store: RecordStore) => RecordQuery;

/**
 * OrderBy - a fixed sort or one derived from the resolved table
 */
export type OrderBy =
  | { kind: "literal"; sort: SortSpec }
  | { kind: "deferred"; resolve: (table: RecordTable) => SortSpec };

export interface RecordLookupOptions extends ValidatorOptions {
  /** Field compared against the value (default "id") */
  field?: string;
  query?: QueryFactory;
}

export interface InRecordsOptions extends RecordLookupOptions {
  /** Row field shown as the option label */
  labelField?: string;
  multiple?: boolean;
  orderBy?: OrderBy;
  /** Label of the empty option prepended by options() */
  zero?: string;
}
