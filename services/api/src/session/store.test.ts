import { describe, expect, it } from 'vitest';
import { MemorySessionStore } from './store.js';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('MemorySessionStore', () => {
  it('stores and deletes values', () => {
    const store = new MemorySessionStore({ ttlMs: 100 });
    store.set('a', { board: [] });
    expect(store.get('a')).toEqual({ board: [] });
    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.get('a')).toBeUndefined();
  });

  it('expires entries after the ttl', () => {
    const time = clock();
    const store = new MemorySessionStore({ ttlMs: 100, now: time.now });
    store.set('a', 1);
    time.advance(99);
    expect(store.get('a')).toBe(1);
    time.advance(1);
    expect(store.get('a')).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('renews the ttl on write', () => {
    const time = clock();
    const store = new MemorySessionStore({ ttlMs: 100, now: time.now });
    store.set('a', 1);
    time.advance(80);
    store.set('a', 2);
    time.advance(80);
    expect(store.get('a')).toBe(2);
  });

  it('sweeps only expired entries', () => {
    const time = clock();
    const store = new MemorySessionStore({ ttlMs: 100, now: time.now });
    store.set('old', 1);
    time.advance(60);
    store.set('new', 2);
    time.advance(50);
    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.get('new')).toBe(2);
  });
});
