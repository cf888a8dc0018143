/**
 * Lazy holds a value computed on first access and cached for the lifetime
 * of the owner. The factory runs at most once, even if it returns undefined.
 */
export class Lazy<T> {
  private cell: { value: T } | null = null;

  constructor(private readonly factory: () => T) {}

  get(): T {
    if (this.cell === null) {
      this.cell = { value: this.factory() };
    }
    return this.cell.value;
  }

  /**
   * Whether the factory has already run
   */
  isComputed(): boolean {
    return this.cell !== null;
  }
}
