/**
 * Process-wide random source
 *
 * Used whenever a caller does not thread its own RandomSource through.
 * Seeding it makes every later draw that falls back to it reproducible.
 */

import { XorShiftRandom, type RandomSource } from './xorshift.js';

function timeSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0;
}

let shared: XorShiftRandom = new XorShiftRandom(timeSeed());

/**
 * Get the shared random source
 */
export function sharedRandom(): RandomSource {
  return shared;
}

/**
 * Reseed the shared random source
 */
export function seedSharedRandom(seed: number): void {
  shared = new XorShiftRandom(seed);
}

/**
 * Reseed the shared random source from the clock
 */
export function resetSharedRandom(): void {
  shared = new XorShiftRandom(timeSeed());
}
