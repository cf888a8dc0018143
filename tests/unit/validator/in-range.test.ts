import { describe, it, expect } from 'vitest';
import { InRange } from '../../../src/lib/validator/in-range.js';
import { deferred, literal } from '../../../src/lib/validator/bound.js';

describe('InRange', () => {
  describe('check()', () => {
    const range = new InRange({ minimum: literal(1), maximum: literal(10) });

    it('should pass values inside the default [min, max) range', () => {
      expect(range.check(1)).toEqual({ value: 1, error: null });
      expect(range.check(9)).toEqual({ value: 9, error: null });
    });

    it('should fail values on or past the exclusive maximum', () => {
      expect(range.check(10)).toEqual({
        value: 10,
        error: 'Enter a value between 1 and 9',
      });
    });

    it('should fail values below the minimum', () => {
      expect(range.check(0).error).toBe('Enter a value between 1 and 9');
    });

    it('should honor inclusive maximum', () => {
      const inclusive = new InRange({
        minimum: literal(1),
        maximum: literal(10),
        include: [true, true],
      });
      expect(inclusive.check(10).error).toBeNull();
      // displayed maximum is still decremented
      expect(inclusive.check(11).error).toBe('Enter a value between 1 and 9');
    });

    it('should honor exclusive minimum', () => {
      const exclusive = new InRange({
        minimum: literal(1),
        include: [false, false],
      });
      expect(exclusive.check(1).error).toBe(
        'Enter a value greater than or equal to 1',
      );
      expect(exclusive.check(2).error).toBeNull();
    });

    it('should describe a maximum-only range', () => {
      const atMost = new InRange({ maximum: literal(100) });
      expect(atMost.check(100).error).toBe(
        'Enter a value less than or equal to 99',
      );
    });

    it('should decrement bigint maxima', () => {
      const atMost = new InRange<bigint>({ maximum: literal(10n) });
      expect(atMost.check(20n).error).toBe(
        'Enter a value less than or equal to 9',
      );
    });

    it('should not decrement non-integer maxima', () => {
      const atMost = new InRange({ maximum: literal(2.5) });
      expect(atMost.check(3).error).toBe(
        'Enter a value less than or equal to 2.5',
      );
    });

    it('should pass anything when no bounds are set', () => {
      const open = new InRange();
      expect(open.check(-1000)).toEqual({ value: -1000, error: null });
      expect(open.check('text')).toEqual({ value: 'text', error: null });
    });

    it('should resolve deferred bounds on every check', () => {
      let limit = 5;
      const dynamic = new InRange({
        maximum: deferred(() => limit),
        include: [true, true],
      });

      expect(dynamic.check(7).error).toBe('Enter a value less than or equal to 4');
      limit = 10;
      expect(dynamic.check(7).error).toBeNull();
    });

    it('should compare dates', () => {
      const future = new InRange({
        minimum: deferred(() => new Date('2026-01-01T00:00:00Z')),
      });
      expect(future.check(new Date('2025-12-31T00:00:00Z')).error).not.toBeNull();
      expect(future.check(new Date('2026-06-01T00:00:00Z')).error).toBeNull();
    });

    it('should compare strings', () => {
      const letters = new InRange({
        minimum: literal('b'),
        maximum: literal('d'),
      });
      expect(letters.check('c').error).toBeNull();
      expect(letters.check('e').error).toBe('Enter a value between b and d');
    });

    it('should fail values that cannot be compared with the bounds', () => {
      expect(range.check('5').error).toBe('Enter a value between 1 and 9');
      expect(range.check(null).error).toBe('Enter a value between 1 and 9');
      expect(range.check(Number.NaN).error).toBe('Enter a value between 1 and 9');
    });

    it('should translate custom messages before interpolating', () => {
      const custom = new InRange({
        minimum: literal(1),
        maximum: literal(10),
        message: 'Out of range {min}-{max}',
      });
      const result = custom.check(20, { translate: (message) => `fr: ${message}` });
      expect(result.error).toBe('fr: Out of range 1-9');
    });

    it('should return identical results for repeated checks', () => {
      expect(range.check(42)).toEqual(range.check(42));
    });
  });
});
