import { describe, it, expect } from 'vitest';

import { resetSharedRandom, seedSharedRandom, sharedRandom } from '../random/shared.js';
import { shuffleInPlace } from '../random/shuffle.js';
import { XorShiftRandom, createRandom, forkSeed } from '../random/xorshift.js';

function draws(random: XorShiftRandom, count: number): number[] {
  return Array.from({ length: count }, () => random.nextUint32());
}

describe('XorShiftRandom', () => {
  it('should repeat its sequence for the same seed', () => {
    expect(draws(createRandom(1234), 10)).toEqual(draws(createRandom(1234), 10));
  });

  it('should give different sequences for different seeds', () => {
    expect(draws(createRandom(1), 5)).not.toEqual(draws(createRandom(2), 5));
  });

  it('should produce a usable stream from seed 0', () => {
    const values = draws(createRandom(0), 8);
    expect(new Set(values).size).toBeGreaterThan(1);
  });

  it('should keep floats in [0, 1) and ints below the bound', () => {
    const random = createRandom(77);
    for (let i = 0; i < 1000; i++) {
      const f = random.nextFloat();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);

      const n = random.nextInt(7);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(7);
    }
  });

  it('should reject bounds that are not positive integers', () => {
    const random = createRandom(3);
    expect(() => random.nextInt(0)).toThrow(RangeError);
    expect(() => random.nextInt(2.5)).toThrow(RangeError);
  });

  describe('fork', () => {
    it('should consume two draws from the parent', () => {
      const parent = createRandom(5);
      const reference = createRandom(5);

      parent.fork();
      draws(reference, 2);
      expect(parent.nextUint32()).toBe(reference.nextUint32());
    });

    it('should derive the same child from the same parent state', () => {
      const a = createRandom(11).fork();
      const b = createRandom(11).fork();
      expect(draws(a, 5)).toEqual(draws(b, 5));
    });

    it('should give a stream independent of the parent', () => {
      const parent = createRandom(11);
      const child = parent.fork();
      expect(draws(child, 5)).not.toEqual(draws(parent, 5));
    });

    it('should rebuild the child from its seed', () => {
      const child = createRandom(forkSeed(createRandom(11)));
      expect(draws(child, 5)).toEqual(draws(createRandom(11).fork(), 5));
    });
  });
});

describe('shared random source', () => {
  it('should replay after reseeding', () => {
    seedSharedRandom(99);
    const first = [sharedRandom().nextUint32(), sharedRandom().nextUint32()];
    seedSharedRandom(99);
    const second = [sharedRandom().nextUint32(), sharedRandom().nextUint32()];
    expect(second).toEqual(first);
    resetSharedRandom();
  });

  it('should match a generator built from the same seed', () => {
    seedSharedRandom(42);
    expect(sharedRandom().nextUint32()).toBe(createRandom(42).nextUint32());
    resetSharedRandom();
  });
});

describe('shuffleInPlace', () => {
  it('should keep every element and return the same array', () => {
    const items = [1, 2, 3, 4, 5, 6, 7, 8];
    const result = shuffleInPlace(items, createRandom(8));
    expect(result).toBe(items);
    expect([...result].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('should shuffle the same way for the same seed', () => {
    const a = shuffleInPlace([0, 1, 2, 3, 4, 5], createRandom(21));
    const b = shuffleInPlace([0, 1, 2, 3, 4, 5], createRandom(21));
    expect(a).toEqual(b);
  });

  it('should leave empty and single-element arrays alone', () => {
    expect(shuffleInPlace([], createRandom(1))).toEqual([]);
    expect(shuffleInPlace(['x'], createRandom(1))).toEqual(['x']);
  });
});
