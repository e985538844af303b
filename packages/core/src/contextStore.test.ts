import { describe, expect, it } from 'vitest';
import { ContextStore } from './contextStore.js';

describe('ContextStore', () => {
  it('starts at the given version and bumps it per applied patch', () => {
    const store = new ContextStore({ topic: 'graphs' }, 4);

    expect(store.version).toBe(4);
    expect(store.apply({ plan: 'outline' })).toBe(5);
    expect(store.apply({})).toBe(6);
    expect(store.version).toBe(6);
  });

  it('overwrites keys and never removes them', () => {
    const store = new ContextStore({ topic: 'graphs', draft: 'v1' });
    store.apply({ draft: 'v2' });

    expect(store.snapshot()).toEqual({ topic: 'graphs', draft: 'v2' });
    expect(store.keys()).toEqual(['topic', 'draft']);
  });

  it('picks only present keys', () => {
    const store = new ContextStore({ a: 1, b: undefined });

    expect(store.pick(['a', 'b', 'c'])).toEqual({ a: 1, b: undefined });
    expect(Object.keys(store.pick(['a', 'b', 'c']))).toEqual(['a', 'b']);
    expect(store.has('b')).toBe(true);
    expect(store.has('c')).toBe(false);
  });

  it('returns snapshots detached from the store', () => {
    const store = new ContextStore({ a: 1 });
    const snapshot = store.snapshot();
    snapshot.a = 2;

    expect(store.get('a')).toBe(1);
  });
});
