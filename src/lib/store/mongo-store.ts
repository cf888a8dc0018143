/**
 * Record store backed by MongoDB collections
 */

import { ObjectId } from "mongodb";
import type { Document, Filter, FindOptions } from "mongodb";
import type { DisplayFormat, Row, RowId, SortDirection } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type {
  MongoStoreOptions,
  RecordField,
  RecordQuery,
  RecordStore,
  RecordTable,
  SelectOptions,
} from "./types.js";

/**
 * The part of a mongodb Collection the store reads through
 */
export interface CollectionLike {
  find(
    filter: Filter<Document>,
    options?: FindOptions,
  ): { toArray(): Promise<Document[]> };
  countDocuments(filter: Filter<Document>): Promise<number>;
}

/**
 * The part of a mongodb Db the store reads through
 */
export interface DatabaseLike {
  collection(name: string): CollectionLike;
}

const OBJECT_ID_HEX = /^[0-9a-f]{24}$/i;

class MongoTable implements RecordTable {
  constructor(
    readonly name: string,
    readonly collection: CollectionLike,
    readonly idField: string,
    readonly format?: DisplayFormat,
  ) {}

  field(name: string): RecordField {
    return { name: name === "id" ? this.idField : name, table: this.name };
  }
}

function toRowId(value: unknown): RowId {
  if (value instanceof ObjectId) return value.toHexString();
  if (typeof value === "number" || typeof value === "string") return value;
  return String(value);
}

class MongoQuery implements RecordQuery {
  constructor(
    readonly table: MongoTable,
    private readonly filter: Document = {},
  ) {}

  where(field: RecordField, value: unknown): RecordQuery {
    // Hex strings match ObjectId keys
    const matched =
      field.name === this.table.idField &&
      typeof value === "string" &&
      OBJECT_ID_HEX.test(value)
        ? new ObjectId(value)
        : value;
    return new MongoQuery(this.table, { ...this.filter, [field.name]: matched });
  }

  async select(options: SelectOptions = {}): Promise<Row[]> {
    const findOptions: FindOptions = {};
    if (options.sort && options.sort.length > 0) {
      const sort: Record<string, SortDirection> = {};
      for (const [field, direction] of options.sort) {
        sort[field === "id" ? this.table.idField : field] = direction;
      }
      findOptions.sort = sort;
    }
    if (options.limit !== undefined) {
      findOptions.limit = options.limit;
    }

    logger.debug("Selecting documents", {
      collection: this.table.name,
      filter: Object.keys(this.filter),
      limit: options.limit,
    });
    const documents = await this.table.collection
      .find(this.filter, findOptions)
      .toArray();
    return documents.map((document) => ({
      ...document,
      id: toRowId(document[this.table.idField]),
    }));
  }

  async count(): Promise<number> {
    return this.table.collection.countDocuments(this.filter);
  }
}

export class MongoRecordStore implements RecordStore {
  private readonly idField: string;
  private readonly formats: Record<string, DisplayFormat>;

  constructor(
    private readonly db: DatabaseLike,
    options: MongoStoreOptions = {},
  ) {
    this.idField = options.idField ?? "_id";
    this.formats = options.formats ?? {};
  }

  private mongoTable(name: string): MongoTable {
    return new MongoTable(
      name,
      this.db.collection(name),
      this.idField,
      this.formats[name],
    );
  }

  table(name: string): RecordTable {
    return this.mongoTable(name);
  }

  all(table: RecordTable): RecordQuery {
    return new MongoQuery(
      table instanceof MongoTable ? table : this.mongoTable(table.name),
    );
  }
}
