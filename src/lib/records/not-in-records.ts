/**
 * Record absence check: the value must not match an existing row, unless
 * that row is the one being edited
 */

import type { CheckContext, CheckResult } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { RecordStore } from "../store/types.js";
import { RecordLookup } from "./lookup.js";
import type { RecordLookupOptions } from "./types.js";

export class NotInRecords extends RecordLookup {
  constructor(
    store: RecordStore,
    tableName: string,
    options: RecordLookupOptions = {},
  ) {
    super(store, tableName, options, "Value already in database");
  }

  async check(value: unknown, context: CheckContext = {}): Promise<CheckResult> {
    const [row] = await this.querySet
      .where(this.field, value)
      .select({ limit: 1 });

    if (row === undefined) {
      return this.pass(value);
    }

    const editing = context.editingRecordId;
    if (editing !== undefined && editing !== null && String(row.id) === String(editing)) {
      logger.debug("Matching row is the record being edited", {
        table: this.tableName,
        id: row.id,
      });
      return this.pass(value);
    }
    return this.fail(value, context);
  }
}
