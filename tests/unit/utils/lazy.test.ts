import { describe, it, expect, vi } from 'vitest';
import { Lazy } from '../../../src/lib/utils/lazy.js';

describe('Lazy', () => {
  it('should compute on first access only', () => {
    const factory = vi.fn(() => ({ created: true }));
    const lazy = new Lazy(factory);

    expect(lazy.isComputed()).toBe(false);
    const first = lazy.get();
    expect(lazy.get()).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(lazy.isComputed()).toBe(true);
  });

  it('should cache undefined results', () => {
    const factory = vi.fn((): string | undefined => undefined);
    const lazy = new Lazy(factory);

    expect(lazy.get()).toBeUndefined();
    expect(lazy.get()).toBeUndefined();
    expect(factory).toHaveBeenCalledTimes(1);
  });
});
