/**
 * Seedable pseudo-random number generation
 *
 * Every stochastic step of the game (tile spawns, random rollouts, shuffling
 * candidate spawn cells) draws from a RandomSource so that a run can be
 * replayed from a single seed.
 */

/**
 * A source of uniformly distributed random numbers
 */
export interface RandomSource {
  /** Next unsigned 32-bit integer */
  nextUint32(): number;
  /** Next float in [0, 1) */
  nextFloat(): number;
  /** Next integer in [0, bound) */
  nextInt(bound: number): number;
  /**
   * Derive an independent child stream.
   * The child is seeded from the parent's next draws, so forking the same
   * parent state always yields the same child.
   */
  fork(): RandomSource;
}

const UINT32_RANGE = 0x100000000;

/**
 * splitmix32 step, used to expand a single seed into generator state
 */
function splitmix32(seed: number): () => number {
  let a = seed | 0;
  return () => {
    a = (a + 0x9e3779b9) | 0;
    let t = a ^ (a >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

/**
 * xorshift128 generator with four 32-bit lanes
 */
export class XorShiftRandom implements RandomSource {
  private x: number;
  private y: number;
  private z: number;
  private w: number;

  constructor(seed: number) {
    const expand = splitmix32(seed);
    this.x = expand();
    this.y = expand();
    this.z = expand();
    this.w = expand();
    // All-zero state is a fixed point of xorshift
    if ((this.x | this.y | this.z | this.w) === 0) {
      this.w = 1;
    }
  }

  nextUint32(): number {
    const t = this.x ^ (this.x << 11);
    this.x = this.y;
    this.y = this.z;
    this.z = this.w;
    this.w = (this.w ^ (this.w >>> 19) ^ (t ^ (t >>> 8))) >>> 0;
    return this.w;
  }

  nextFloat(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`Random bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.nextFloat() * bound);
  }

  fork(): XorShiftRandom {
    return new XorShiftRandom(forkSeed(this));
  }
}

/**
 * Draw the seed of a child stream from a parent source.
 * `createRandom(forkSeed(parent))` is the stream `parent.fork()` would return.
 */
export function forkSeed(random: RandomSource): number {
  return random.nextUint32() ^ Math.imul(random.nextUint32(), 0x85ebca6b);
}

/**
 * Build a generator from a seed
 */
export function createRandom(seed: number): XorShiftRandom {
  return new XorShiftRandom(seed);
}
