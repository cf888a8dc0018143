/**
 * Build validators from a rules document
 */

import { logger } from "../../utils/logger.js";
import { RuleError } from "../../utils/errors.js";
import { InRecords } from "../records/in-records.js";
import { NotInRecords } from "../records/not-in-records.js";
import type { RecordStore } from "../store/types.js";
import { literal } from "../validator/bound.js";
import { InRange } from "../validator/in-range.js";
import { InSet } from "../validator/in-set.js";
import { RuleSet } from "./rule-set.js";
import type { CompiledRule } from "./rule-set.js";
import type {
  RangeRule,
  RuleEntry,
  RulesDocument,
  ScalarValue,
  SetRule,
} from "./types.js";

function buildRange(rule: RangeRule): InRange<ScalarValue> {
  return new InRange<ScalarValue>({
    minimum: rule.min !== undefined ? literal(rule.min) : undefined,
    maximum: rule.max !== undefined ? literal(rule.max) : undefined,
    include: rule.include,
    message: rule.message,
  });
}

function buildSet(rule: SetRule): InSet {
  const options = {
    labels: rule.labels,
    multiple: rule.multiple,
    zero: rule.zero,
    sort: rule.sort,
    message: rule.message,
  };
  if (rule.pairs) {
    return new InSet(rule.pairs, options);
  }
  return new InSet(rule.items ?? [], options);
}

function requireStore(
  store: RecordStore | undefined,
  field: string,
  kind: string,
): RecordStore {
  if (!store) {
    throw new RuleError(
      `Rule "${kind}" on field ${field} needs a record store`,
    );
  }
  return store;
}

function compileEntry(
  field: string,
  entry: RuleEntry,
  store: RecordStore | undefined,
): CompiledRule {
  if ("range" in entry) {
    return { kind: "range", check: buildRange(entry.range) };
  }
  if ("set" in entry) {
    const check = buildSet(entry.set);
    return { kind: "set", check, options: check };
  }
  if ("exists" in entry) {
    const rule = entry.exists;
    const orderBy = rule.orderBy;
    const check = new InRecords(
      requireStore(store, field, "exists"),
      rule.table,
      {
        field: rule.field,
        labelField: rule.labelField,
        multiple: rule.multiple,
        orderBy: orderBy ? { kind: "literal", sort: orderBy } : undefined,
        zero: rule.zero,
        message: rule.message,
      },
    );
    return { kind: "exists", check, options: check };
  }

  const rule = entry.absent;
  return {
    kind: "absent",
    check: new NotInRecords(requireStore(store, field, "absent"), rule.table, {
      field: rule.field,
      message: rule.message,
    }),
  };
}

/**
 * Create the validators of every field. Record rules need a store.
 *
 * @example
 * const rules = buildRuleSet(
 *   { fields: { role: [{ set: { items: ["admin", "member"] } }] } },
 * );
 * await rules.validate("role", "admin"); // { value: "admin", error: null }
 */
export function buildRuleSet(
  document: RulesDocument,
  store?: RecordStore,
): RuleSet {
  const fields = new Map<string, CompiledRule[]>();
  for (const [field, entries] of Object.entries(document.fields)) {
    fields.set(
      field,
      entries.map((entry) => compileEntry(field, entry, store)),
    );
  }

  logger.debug("Rule set built", {
    fields: fields.size,
    rules: [...fields.values()].reduce((sum, rules) => sum + rules.length, 0),
  });
  return new RuleSet(fields);
}

/**
 * Whether any field uses a rule that queries a record store
 */
export function requiresStore(document: RulesDocument): boolean {
  return Object.values(document.fields).some((entries) =>
    entries.some((entry) => "exists" in entry || "absent" in entry),
  );
}
