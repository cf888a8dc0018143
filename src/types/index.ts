// Core re-exports for the fieldcheck type system
// Module-specific types are exported from each module's index

export * from "./data-model.js";
