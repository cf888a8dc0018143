import { describe, it, expect } from 'vitest';
import { compareOptionLabels, interpolate, renderRow } from '../../../src/utils/format.js';

describe('interpolate()', () => {
  it('should replace known placeholders', () => {
    expect(interpolate('between {min} and {max}', { min: 1, max: 9 })).toBe(
      'between 1 and 9',
    );
  });

  it('should leave unknown placeholders in place', () => {
    expect(interpolate('{a} {b}', { a: 'x' })).toBe('x {b}');
  });
});

describe('renderRow()', () => {
  const row = { id: 4, name: 'Ada', email: 'ada@example.com' };

  it('should render template formats', () => {
    expect(renderRow('{name} <{email}>', row)).toBe('Ada <ada@example.com>');
  });

  it('should call function formats', () => {
    expect(renderRow((r) => `#${r.id}`, row)).toBe('#4');
  });
});

describe('compareOptionLabels()', () => {
  it('should compare labels ignoring case', () => {
    expect(compareOptionLabels(['a', 'apple'], ['b', 'Banana'])).toBe(-1);
    expect(compareOptionLabels(['a', 'Zed'], ['b', 'apple'])).toBe(1);
    expect(compareOptionLabels(['a', 'same'], ['b', 'SAME'])).toBe(0);
  });
});
