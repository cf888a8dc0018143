/**
 * RuleSet - validators grouped by field name
 */

import type {
  CheckContext,
  CheckResult,
  FieldCheck,
  Option,
  OptionSource,
} from "../../types/data-model.js";
import { RuleError } from "../../utils/errors.js";
import { runChecks } from "../validator/pipeline.js";

export type RuleKind = "range" | "set" | "exists" | "absent";

export interface CompiledRule {
  kind: RuleKind;
  check: FieldCheck;
  /** Present for rules that can list their accepted values */
  options?: OptionSource;
}

export class RuleSet {
  constructor(private readonly fields: ReadonlyMap<string, readonly CompiledRule[]>) {}

  fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  rulesFor(field: string): readonly CompiledRule[] {
    const rules = this.fields.get(field);
    if (!rules) {
      throw new RuleError(`No rules for field: ${field}`, {
        fields: this.fieldNames(),
      });
    }
    return rules;
  }

  /**
   * Run every rule of the field, stopping at the first failure
   */
  async validate(
    field: string,
    value: unknown,
    context: CheckContext = {},
  ): Promise<CheckResult> {
    const checks = this.rulesFor(field).map((rule) => rule.check);
    return runChecks(value, checks, context);
  }

  /**
   * Options of the field's first rule that offers them
   */
  async options(
    field: string,
    includeZero = true,
  ): Promise<Option<string | number>[]> {
    const source = this.rulesFor(field).find((rule) => rule.options)?.options;
    if (!source) {
      throw new RuleError(`Field ${field} has no rule that lists options`);
    }
    return source.options(includeZero);
  }
}
