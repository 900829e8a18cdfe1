import { describe, expect, it } from 'vitest';
import { SymbolStore } from '../lib/symbolStore';

describe('SymbolStore', () => {
  it('stores the value returned by update', () => {
    const store = new SymbolStore<number>();

    expect(store.update('AAA', current => (current ?? 0) + 1)).toBe(1);
    expect(store.update('AAA', current => (current ?? 0) + 1)).toBe(2);
    expect(store.get('AAA')).toBe(2);
  });

  it('removes the entry when update returns undefined', () => {
    const store = new SymbolStore<number>();
    store.set('AAA', 5);

    expect(store.update('AAA', () => undefined)).toBeUndefined();
    expect(store.get('AAA')).toBeUndefined();
    expect(store.symbols()).toEqual([]);
  });

  it('lists symbols in insertion order and clears them', () => {
    const store = new SymbolStore<string>();
    store.set('BBB', 'b');
    store.set('AAA', 'a');

    expect(store.symbols()).toEqual(['BBB', 'AAA']);
    expect(store.delete('BBB')).toBe(true);
    expect(store.delete('BBB')).toBe(false);

    store.clear();
    expect(store.symbols()).toEqual([]);
  });
});
