/**
 * CLI configuration types
 */

import type { Row } from "../../types/data-model.js";

/**
 * Fixture file contents: rows keyed by table name
 */
export type FixtureTables = Record<string, Row[]>;

/**
 * Options shared by every command that loads a rules file
 */
export interface RulesCommandOptions {
  rules: string;
  field: string;
  fixtures?: string;
  uri?: string;
  database?: string;
  idField?: string;
}

export interface CheckCommandOptions extends RulesCommandOptions {
  value: string;
  json?: boolean;
  editingId?: string;
}

export interface OptionsCommandOptions extends RulesCommandOptions {
  zero?: boolean;
}
