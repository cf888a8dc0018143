/**
 * Integration test for the check and options commands
 * Runs the command handlers against rules and fixture files on disk
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCheck, exitCodeFor } from '../../src/cli/commands/check.js';
import { runOptions } from '../../src/cli/commands/options.js';
import { ConfigError, ErrorCode, FileIOError } from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logger.js';

const RULES_YAML = `
store:
  formats:
    users: "{name} <{email}>"
fields:
  age:
    - range: { min: 18, max: 130, include: [true, true] }
  role:
    - set: { items: [admin, member], zero: "Pick a role" }
  owner:
    - exists: { table: users, labelField: name, orderBy: [[name, 1]] }
  reviewer:
    - exists: { table: users }
  email:
    - absent: { table: users, field: email, message: "Email already registered" }
`;

const FIXTURES = {
  users: [
    { id: 1, name: 'Grace', email: 'grace@example.com' },
    { id: 2, name: 'Ada', email: 'ada@example.com' },
  ],
};

describe('CLI commands - Integration', () => {
  let dir: string;
  let rules: string;
  let fixtures: string;

  beforeAll(async () => {
    logger.setLevel('error');
    dir = await mkdtemp(join(tmpdir(), 'fieldcheck-'));
    rules = join(dir, 'rules.yaml');
    fixtures = join(dir, 'fixtures.json');
    await writeFile(rules, RULES_YAML, 'utf8');
    await writeFile(fixtures, JSON.stringify(FIXTURES), 'utf8');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
    logger.setLevel('info');
  });

  describe('runCheck()', () => {
    it('should pass a value parsed as JSON', async () => {
      const report = await runCheck({ rules, fixtures, field: 'age', value: '42', json: true });
      expect(report).toEqual({
        status: 'success',
        field: 'age',
        value: 42,
        error: null,
        passed: true,
      });
    });

    it('should report a failed range check', async () => {
      const report = await runCheck({ rules, fixtures, field: 'age', value: '17', json: true });
      expect(report.passed).toBe(false);
      expect(report.error).toBe('Enter a value between 18 and 129');
    });

    it('should check values against fixture rows', async () => {
      const found = await runCheck({ rules, fixtures, field: 'owner', value: '1' });
      const missing = await runCheck({ rules, fixtures, field: 'owner', value: '5' });

      expect(found.passed).toBe(true);
      expect(missing.error).toBe('Value not in database');
    });

    it('should exempt the record being edited', async () => {
      const taken = await runCheck({ rules, fixtures, field: 'email', value: 'ada@example.com' });
      const editing = await runCheck({
        rules,
        fixtures,
        field: 'email',
        value: 'ada@example.com',
        editingId: '2',
      });

      expect(taken.error).toBe('Email already registered');
      expect(editing.passed).toBe(true);
    });

    it('should read numeric text as a number for range fields', async () => {
      const report = await runCheck({ rules, fixtures, field: 'age', value: '42' });
      expect(report.value).toBe(42);
      expect(report.passed).toBe(true);
    });

    it('should keep numeric text as text for other fields', async () => {
      const report = await runCheck({ rules, fixtures, field: 'role', value: '42' });
      expect(report.value).toBe('42');
      expect(report.error).toBe('Value not allowed');
    });

    it('should reject a value that is not JSON', async () => {
      await expect(
        runCheck({ rules, fixtures, field: 'age', value: 'forty', json: true }),
      ).rejects.toThrow(ConfigError);
    });

    it('should report a missing rules file', async () => {
      await expect(
        runCheck({ rules: join(dir, 'missing.yaml'), field: 'age', value: '1' }),
      ).rejects.toThrow(FileIOError);
    });

    it('should require store settings without fixtures', async () => {
      vi.stubEnv('FIELDCHECK_MONGO_URI', '');
      try {
        await expect(runCheck({ rules, field: 'age', value: '20' })).rejects.toThrow(
          'MongoDB URI is required',
        );
      } finally {
        vi.unstubAllEnvs();
      }
    });
  });

  describe('runOptions()', () => {
    it('should list set options with the zero option', async () => {
      expect(await runOptions({ rules, fixtures, field: 'role' })).toEqual([
        ['', 'Pick a role'],
        ['admin', 'admin'],
        ['member', 'member'],
      ]);
      expect(await runOptions({ rules, fixtures, field: 'role', zero: false })).toEqual([
        ['admin', 'admin'],
        ['member', 'member'],
      ]);
    });

    it('should list record options in order', async () => {
      expect(await runOptions({ rules, fixtures, field: 'owner' })).toEqual([
        [2, 'Ada'],
        [1, 'Grace'],
      ]);
    });

    it('should label rows with the configured display format', async () => {
      expect(await runOptions({ rules, fixtures, field: 'reviewer' })).toEqual([
        [1, 'Grace <grace@example.com>'],
        [2, 'Ada <ada@example.com>'],
      ]);
    });
  });

  describe('exitCodeFor()', () => {
    it('should map error codes to exit codes', () => {
      expect(exitCodeFor(ErrorCode.FILE_IO_ERROR)).toBe(4);
      expect(exitCodeFor(ErrorCode.STORE_CONNECTION_ERROR)).toBe(3);
      expect(exitCodeFor(ErrorCode.CONFIG_ERROR)).toBe(2);
      expect(exitCodeFor(ErrorCode.RULE_ERROR)).toBe(2);
      expect(exitCodeFor(ErrorCode.GENERAL_ERROR)).toBe(1);
    });
  });
});
