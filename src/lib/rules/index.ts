/**
 * Rules module - declarative rule documents compiled into validators
 */

export * from "./types.js";
export { parseRulesDocument } from "./document.js";
export type { DocumentIssue } from "./document.js";
export { rulesDocumentSchema } from "./schema.js";
export { buildRuleSet, requiresStore } from "./builder.js";
export { RuleSet } from "./rule-set.js";
export type { CompiledRule, RuleKind } from "./rule-set.js";
