/**
 * Record existence check: the value must match an existing row
 */

import type {
  CheckContext,
  CheckResult,
  Option,
  Row,
  RowId,
  SortSpec,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import { renderRow } from "../../utils/format.js";
import type { RecordStore } from "../store/types.js";
import { Lazy } from "../utils/lazy.js";
import { RecordLookup } from "./lookup.js";
import type { InRecordsOptions, OrderBy } from "./types.js";

export class InRecords extends RecordLookup {
  labelField: string | undefined;
  multiple: boolean;
  orderBy: OrderBy | undefined;
  zero: string | undefined;

  private readonly sortingCell = new Lazy<SortSpec | undefined>(() => {
    if (!this.orderBy) return undefined;
    switch (this.orderBy.kind) {
      case "literal":
        return this.orderBy.sort;
      case "deferred":
        return this.orderBy.resolve(this.table);
    }
  });

  constructor(
    store: RecordStore,
    tableName: string,
    options: InRecordsOptions = {},
  ) {
    super(store, tableName, options, "Value not in database");
    this.labelField = options.labelField;
    this.multiple = options.multiple ?? false;
    this.orderBy = options.orderBy;
    this.zero = options.zero;
  }

  get sorting(): SortSpec | undefined {
    return this.sortingCell.get();
  }

  private async rows(): Promise<Row[]> {
    const sort = this.sorting;
    return this.querySet.select(sort ? { sort } : {});
  }

  private label(row: Row): string {
    if (this.labelField !== undefined) {
      return String(row[this.labelField]);
    }
    const format = this.table.format;
    if (format !== undefined) {
      return renderRow(format, row);
    }
    return String(row.id);
  }

  async options(includeZero = true): Promise<Option<RowId>[]> {
    const rows = await this.rows();
    const items: Option<RowId>[] = rows.map((row) => [row.id, this.label(row)]);
    if (includeZero && this.zero !== undefined && !this.multiple) {
      items.unshift(["", this.zero]);
    }
    return items;
  }

  async check(value: unknown, context: CheckContext = {}): Promise<CheckResult> {
    if (this.multiple) {
      const values = Array.isArray(value) ? value : [value];
      const ids = new Set((await this.rows()).map((row) => String(row.id)));
      logger.debug("Checking values against rows", {
        table: this.tableName,
        values: values.length,
        rows: ids.size,
      });
      if (values.every((v) => ids.has(String(v)))) {
        return this.pass(values);
      }
      return this.fail(values, context);
    }

    logger.debug("Counting matching rows", {
      table: this.tableName,
      field: this.fieldName,
    });
    const matches = await this.querySet.where(this.field, value).count();
    if (matches > 0) {
      return this.pass(value);
    }
    return this.fail(value, context);
  }
}
