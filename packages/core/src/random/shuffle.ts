import type { RandomSource } from './xorshift.js';

/**
 * Fisher-Yates shuffle, in place
 *
 * @returns the same array, for chaining
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    const held = items[i]!;
    items[i] = items[j]!;
    items[j] = held;
  }
  return items;
}
