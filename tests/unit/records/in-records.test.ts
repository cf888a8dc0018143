import { describe, it, expect, vi } from 'vitest';
import { InRecords } from '../../../src/lib/records/in-records.js';
import { MemoryRecordStore } from '../../../src/lib/store/memory-store.js';
import type { RecordTable } from '../../../src/lib/store/types.js';
import type { SortSpec } from '../../../src/types/data-model.js';
import { userRows } from './fixtures.js';

describe('InRecords', () => {
  const store = new MemoryRecordStore({ users: userRows(), empty: [] });

  describe('check() in single mode', () => {
    it('should pass a value matching an existing id', async () => {
      const exists = new InRecords(store, 'users');
      expect(await exists.check(1)).toEqual({ value: 1, error: null });
    });

    it('should match the string form of the value', async () => {
      const exists = new InRecords(store, 'users');
      expect(await exists.check('2')).toEqual({ value: '2', error: null });
    });

    it('should fail a value with no matching row', async () => {
      const exists = new InRecords(store, 'users');
      expect(await exists.check(9)).toEqual({
        value: 9,
        error: 'Value not in database',
      });
    });

    it('should look up a configured field', async () => {
      const exists = new InRecords(store, 'users', { field: 'email' });
      expect((await exists.check('ada@example.com')).error).toBeNull();
      expect((await exists.check('nobody@example.com')).error).toBe(
        'Value not in database',
      );
    });

    it('should restrict matches to the supplied query-set', async () => {
      const exists = new InRecords(store, 'users', {
        query: (s) => {
          const users = s.table('users');
          return s.all(users).where(users.field('team'), 'labs');
        },
        message: 'Pick a labs member',
      });
      expect((await exists.check(3)).error).toBeNull();
      expect((await exists.check(1)).error).toBe('Pick a labs member');
    });
  });

  describe('check() in multiple mode', () => {
    const exists = new InRecords(store, 'users', { multiple: true });

    it('should pass when every value is an existing id', async () => {
      expect(await exists.check([1, 3])).toEqual({ value: [1, 3], error: null });
    });

    it('should fail when any value is unknown', async () => {
      expect(await exists.check([1, 9])).toEqual({
        value: [1, 9],
        error: 'Value not in database',
      });
    });

    it('should wrap a scalar into a list', async () => {
      expect(await exists.check(2)).toEqual({ value: [2], error: null });
    });
  });

  describe('options()', () => {
    it('should label rows with the label field', async () => {
      const exists = new InRecords(store, 'users', { labelField: 'name' });
      expect(await exists.options()).toEqual([
        [1, 'Grace'],
        [2, 'Ada'],
        [3, 'Alan'],
      ]);
    });

    it('should apply a literal ordering', async () => {
      const exists = new InRecords(store, 'users', {
        labelField: 'name',
        orderBy: { kind: 'literal', sort: [['name', -1]] },
      });
      expect(await exists.options()).toEqual([
        [1, 'Grace'],
        [3, 'Alan'],
        [2, 'Ada'],
      ]);
    });

    it('should resolve a deferred ordering once against the table', async () => {
      const resolve = vi.fn((table: RecordTable): SortSpec => (table.name === 'users' ? [['name', 1]] : []));
      const exists = new InRecords(store, 'users', {
        labelField: 'name',
        orderBy: { kind: 'deferred', resolve },
      });

      expect(await exists.options()).toEqual([
        [2, 'Ada'],
        [3, 'Alan'],
        [1, 'Grace'],
      ]);
      await exists.options();
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve.mock.calls[0]?.[0].name).toBe('users');
    });

    it('should fall back to the table display format', async () => {
      const formatted = new MemoryRecordStore(
        { users: userRows() },
        { formats: { users: '{name} <{email}>' } },
      );
      const exists = new InRecords(formatted, 'users');
      const options = await exists.options();
      expect(options[1]).toEqual([2, 'Ada <ada@example.com>']);
    });

    it('should fall back to the id', async () => {
      const exists = new InRecords(store, 'users');
      expect(await exists.options()).toEqual([
        [1, '1'],
        [2, '2'],
        [3, '3'],
      ]);
    });

    it('should prepend the zero option unless multiple', async () => {
      const single = new InRecords(store, 'empty', { zero: 'Nobody' });
      const multiple = new InRecords(store, 'empty', { zero: 'Nobody', multiple: true });

      expect(await single.options()).toEqual([['', 'Nobody']]);
      expect(await single.options(false)).toEqual([]);
      expect(await multiple.options()).toEqual([]);
    });
  });

  it('should propagate store errors', async () => {
    const exists = new InRecords(store, 'missing');
    await expect(exists.check(1)).rejects.toThrow('Unknown table: missing');
  });
});
