/**
 * Random sources
 */

export { type RandomSource, XorShiftRandom, createRandom, forkSeed } from './xorshift.js';
export { sharedRandom, seedSharedRandom, resetSharedRandom } from './shared.js';
export { shuffleInPlace } from './shuffle.js';
