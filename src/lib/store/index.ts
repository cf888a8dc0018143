/**
 * Store module - record stores the record checks query
 */

export * from "./types.js";
export { MemoryRecordStore } from "./memory-store.js";
export { MongoRecordStore } from "./mongo-store.js";
export type { CollectionLike, DatabaseLike } from "./mongo-store.js";
export { MongoConnector, sanitizeUri } from "./connector.js";
