/**
 * Shared base for checks that look values up in a record store
 */

import type { RecordField, RecordQuery, RecordStore, RecordTable } from "../store/types.js";
import { Lazy } from "../utils/lazy.js";
import { Validator } from "../validator/base.js";
import type { QueryFactory, RecordLookupOptions } from "./types.js";

export abstract class RecordLookup extends Validator {
  fieldName: string;
  query: QueryFactory | undefined;

  // Resolved once per instance; later changes to the inputs are ignored
  private readonly tableCell = new Lazy<RecordTable>(() =>
    this.store.table(this.tableName),
  );
  private readonly querySetCell = new Lazy<RecordQuery>(() =>
    this.query ? this.query(this.store) : this.store.all(this.table),
  );
  private readonly fieldCell = new Lazy<RecordField>(() =>
    this.table.field(this.fieldName),
  );

  constructor(
    readonly store: RecordStore,
    public tableName: string,
    options: RecordLookupOptions = {},
    defaultMessage?: string,
  ) {
    super(options, defaultMessage);
    this.fieldName = options.field ?? "id";
    this.query = options.query;
  }

  get table(): RecordTable {
    return this.tableCell.get();
  }

  get querySet(): RecordQuery {
    return this.querySetCell.get();
  }

  get field(): RecordField {
    return this.fieldCell.get();
  }
}
