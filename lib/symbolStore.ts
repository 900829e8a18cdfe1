/**
 * Symbol-keyed state owned by a single component.
 *
 * Every read-modify-write goes through `update`, which runs synchronously so no
 * other task can interleave between the read and the write of an entry.
 */
export class SymbolStore<T> {
  private readonly entries = new Map<string, T>();

  get(symbol: string): T | undefined {
    return this.entries.get(symbol);
  }

  set(symbol: string, value: T): void {
    this.entries.set(symbol, value);
  }

  delete(symbol: string): boolean {
    return this.entries.delete(symbol);
  }

  /**
   * Applies `fn` to the current entry (or `undefined`) and stores the result.
   * Returning `undefined` removes the entry.
   */
  update(symbol: string, fn: (current: T | undefined) => T | undefined): T | undefined {
    const next = fn(this.entries.get(symbol));
    if (next === undefined) {
      this.entries.delete(symbol);
    } else {
      this.entries.set(symbol, next);
    }
    return next;
  }

  symbols(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }
}
