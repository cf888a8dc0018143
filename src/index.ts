/**
 * fieldcheck: range, set and record-store validators
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/validator/index.js";
export * from "./lib/records/index.js";
export * from "./lib/store/index.js";
export * from "./lib/rules/index.js";
export { Lazy } from "./lib/utils/lazy.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/format.js";
export * from "./utils/config-loader.js";
