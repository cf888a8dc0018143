/**
 * In-process record store backed by plain arrays of rows
 */

import type { DisplayFormat, Row, SortSpec } from "../../types/data-model.js";
import { RuleError } from "../../utils/errors.js";
import { compareValues, isComparable } from "../validator/bound.js";
import type {
  RecordField,
  RecordQuery,
  RecordStore,
  RecordTable,
  SelectOptions,
  StoreOptions,
} from "./types.js";

type Predicate = (row: Row) => boolean;

class MemoryTable implements RecordTable {
  constructor(
    readonly name: string,
    readonly rows: readonly Row[],
    readonly format?: DisplayFormat,
  ) {}

  field(name: string): RecordField {
    return { name, table: this.name };
  }
}

function compareRows(a: Row, b: Row, sort: SortSpec): number {
  for (const [field, direction] of sort) {
    const left = a[field];
    const right = b[field];
    const order =
      isComparable(left) && isComparable(right)
        ? compareValues(left, right) ?? 0
        : 0;
    if (order !== 0) {
      return order * direction;
    }
  }
  return 0;
}

class MemoryQuery implements RecordQuery {
  constructor(
    readonly table: MemoryTable,
    private readonly predicates: readonly Predicate[] = [],
  ) {}

  where(field: RecordField, value: unknown): RecordQuery {
    const expected = String(value);
    return new MemoryQuery(this.table, [
      ...this.predicates,
      (row) => field.name in row && String(row[field.name]) === expected,
    ]);
  }

  private matching(): Row[] {
    return this.table.rows.filter((row) =>
      this.predicates.every((predicate) => predicate(row)),
    );
  }

  async select(options: SelectOptions = {}): Promise<Row[]> {
    let rows = this.matching();
    const { sort, limit } = options;
    if (sort && sort.length > 0) {
      rows = [...rows].sort((a, b) => compareRows(a, b, sort));
    }
    if (limit !== undefined) {
      rows = rows.slice(0, limit);
    }
    return rows.map((row) => ({ ...row }));
  }

  async count(): Promise<number> {
    return this.matching().length;
  }
}

export class MemoryRecordStore implements RecordStore {
  private readonly tables = new Map<string, MemoryTable>();

  constructor(
    tables: Record<string, readonly Row[]>,
    options: StoreOptions = {},
  ) {
    for (const [name, rows] of Object.entries(tables)) {
      this.tables.set(
        name,
        new MemoryTable(name, rows, options.formats?.[name]),
      );
    }
  }

  table(name: string): RecordTable {
    const table = this.tables.get(name);
    if (!table) {
      throw new RuleError(`Unknown table: ${name}`, {
        tables: [...this.tables.keys()],
      });
    }
    return table;
  }

  all(table: RecordTable): RecordQuery {
    const owned = this.tables.get(table.name);
    if (!owned) {
      throw new RuleError(`Unknown table: ${table.name}`);
    }
    return new MemoryQuery(owned);
  }

  /**
   * Table names known to this store
   */
  tableNames(): string[] {
    return [...this.tables.keys()];
  }
}
