import { describe, it, expect } from 'vitest';

import { Vector2, Vector3, scaled } from './vector';

// Small LCG so the "random" inputs are the same on every run.
function rng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return (s / 2 ** 32) * 2000 - 1000;
  };
}

describe('Vector2', () => {
  it('has magnitude 5 for (3, 4)', () => {
    expect(new Vector2(3, 4).magnitude()).toBe(5);
  });

  it('builds from and back to a pair', () => {
    const v = Vector2.fromTuple([1.5, -2]);
    expect(v.x).toBe(1.5);
    expect(v.y).toBe(-2);
    expect(v.toTuple()).toEqual([1.5, -2]);
    expect(Vector2.zero().toTuple()).toEqual([0, 0]);
  });

  it('subtracts component-wise', () => {
    expect(new Vector2(5, 1).sub(new Vector2(2, 4)).toTuple()).toEqual([3, -3]);
  });

  it('returns new values and leaves operands untouched', () => {
    const a = new Vector2(1, 2);
    const b = new Vector2(3, 4);
    const c = a.add(b);
    expect(c).not.toBe(a);
    expect(a.toTuple()).toEqual([1, 2]);
    expect(b.toTuple()).toEqual([3, 4]);
  });

  it('scales the same from either side', () => {
    const v = new Vector2(1.25, -7);
    expect(scaled(3, v).equals(v.scale(3))).toBe(true);
  });

  it('obeys the algebra laws for random finite inputs', () => {
    const next = rng(42);
    for (let i = 0; i < 200; i++) {
      const a = new Vector2(next(), next());
      const b = new Vector2(next(), next());
      const c = new Vector2(next(), next());
      const k = next();

      // commutative addition is exact in IEEE arithmetic
      expect(a.add(b).equals(b.add(a))).toBe(true);

      const left = a.add(b).add(c);
      const right = a.add(b.add(c));
      expect(left.x).toBeCloseTo(right.x, 9);
      expect(left.y).toBeCloseTo(right.y, 9);

      const dist = a.add(b).scale(k);
      const spread = a.scale(k).add(b.scale(k));
      expect(dist.x).toBeCloseTo(spread.x, 6);
      expect(dist.y).toBeCloseTo(spread.y, 6);
    }
  });
});

describe('Vector3', () => {
  it('has magnitude 7 for (2, 3, 6)', () => {
    expect(new Vector3(2, 3, 6).magnitude()).toBe(7);
  });

  it('adds, subtracts and scales component-wise', () => {
    const a = new Vector3(1, 2, 3);
    const b = new Vector3(4, 5, 6);
    expect(a.add(b).toTuple()).toEqual([5, 7, 9]);
    expect(b.sub(a).toTuple()).toEqual([3, 3, 3]);
    expect(a.scale(2).toTuple()).toEqual([2, 4, 6]);
    expect(Vector3.fromTuple([0, 0, 1]).toTuple()).toEqual([0, 0, 1]);
    expect(Vector3.zero().magnitude()).toBe(0);
  });
});
