import { AlreadyInitializedError } from '../errors.js';

/**
 * A slot that can be filled exactly once, either explicitly with `set` or
 * lazily with `getOrInit`. A second write throws `AlreadyInitializedError`
 * and leaves the first value in place.
 */
export class WriteOnce<T> {
  private cell: { readonly value: T } | null = null;

  constructor(private readonly label: string) {}

  get(): T | undefined {
    return this.cell?.value;
  }

  set(value: T): void {
    if (this.cell) throw new AlreadyInitializedError(this.label);
    this.cell = { value };
  }

  getOrInit(init: () => T): T {
    if (this.cell) return this.cell.value;
    const value = init();
    this.cell = { value };
    return value;
  }
}
