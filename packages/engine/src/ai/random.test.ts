import { describe, expect, it } from 'vitest';
import { createRng, randomChoice } from './random.js';

describe('createRng', () => {
  it('repeats its stream for the same seed', () => {
    const a = createRng(1234);
    const b = createRng(1234);
    const first = Array.from({ length: 5 }, () => a());
    const second = Array.from({ length: 5 }, () => b());
    expect(first).toEqual(second);
  });

  it('stays within [0, 1)', () => {
    const rng = createRng(99);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });
});

describe('randomChoice', () => {
  it('maps the draw onto an index', () => {
    expect(randomChoice(['a', 'b', 'c'], () => 0)).toBe('a');
    expect(randomChoice(['a', 'b', 'c'], () => 0.5)).toBe('b');
    expect(randomChoice(['a', 'b', 'c'], () => 0.999)).toBe('c');
  });

  it('throws on an empty list', () => {
    expect(() => randomChoice([], () => 0)).toThrow(RangeError);
  });
});
