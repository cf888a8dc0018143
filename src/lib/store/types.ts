/**
 * Record store module types
 *
 * The narrow surface the record checks need from a backing store. Stores
 * are read only from the validators' point of view.
 */

import type {
  DisplayFormat,
  Row,
  SortSpec,
} from "../../types/data-model.js";

export interface RecordField {
  readonly name: string;
  readonly table: string;
}

export interface RecordTable {
  readonly name: string;
  /** Default display format for rows of this table */
  readonly format?: DisplayFormat;
  field(name: string): RecordField;
}

export interface SelectOptions {
  sort?: SortSpec;
  limit?: number;
}

/**
 * RecordQuery - a filtered view over one table's rows
 */
export interface RecordQuery {
  readonly table: RecordTable;
  /** Narrow the view to rows where `field` equals `value` */
  where(field: RecordField, value: unknown): RecordQuery;
  select(options?: SelectOptions): Promise<Row[]>;
  count(): Promise<number>;
}

export interface RecordStore {
  table(name: string): RecordTable;
  /** Every row of the table */
  all(table: RecordTable): RecordQuery;
}

export interface StoreOptions {
  /** Display formats keyed by table name */
  formats?: Record<string, DisplayFormat>;
}

export interface MongoStoreOptions extends StoreOptions {
  /** Document field exposed as the row id (default "_id") */
  idField?: string;
}

export interface MongoConnection {
  uri: string;
  database: string;
}
