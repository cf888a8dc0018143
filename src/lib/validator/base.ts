/**
 * Base class shared by every validator
 */

import type {
  CheckContext,
  CheckResult,
  FieldCheck,
} from "../../types/data-model.js";
import type { ValidatorOptions } from "./types.js";

export abstract class Validator implements FieldCheck {
  readonly message: string | undefined;

  constructor(
    options: ValidatorOptions = {},
    private readonly defaultMessage: string = "Invalid value",
  ) {
    this.message = options.message;
  }

  abstract check(
    value: unknown,
    context?: CheckContext,
  ): CheckResult | Promise<CheckResult>;

  protected translate(message: string, context: CheckContext = {}): string {
    return context.translate ? context.translate(message) : message;
  }

  protected pass<T>(value: T): CheckResult<T> {
    return { value, error: null };
  }

  protected fail<T>(value: T, context: CheckContext = {}): CheckResult<T> {
    return {
      value,
      error: this.translate(this.message ?? this.defaultMessage, context),
    };
  }
}
