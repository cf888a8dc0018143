/**
 * Records module - checks backed by a record store
 */

export * from "./types.js";
export { RecordLookup } from "./lookup.js";
export { InRecords } from "./in-records.js";
export { NotInRecords } from "./not-in-records.js";
