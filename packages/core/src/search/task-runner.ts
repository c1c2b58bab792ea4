/**
 * Fan-out of independent search tasks
 *
 * Every task receives its own item (a cloned board, an index) and shares no
 * mutable state with its siblings. In parallel mode each task also gets its
 * own random stream, forked from the caller's source in task order before
 * any task runs. The streams, and therefore the results, do not depend on
 * the order in which tasks are executed.
 */

import type { RandomSource } from '../random/xorshift.js';

/**
 * A unit of search work
 */
export type SearchTask<T, R> = (item: T, random: RandomSource) => R;

/**
 * Run a task for every item and collect the results in item order
 *
 * @param parallel - Give each task a forked random stream instead of
 *   sharing the caller's source
 */
export function runTasks<T, R>(
  items: readonly T[],
  task: SearchTask<T, R>,
  random: RandomSource,
  parallel: boolean,
): R[] {
  if (!parallel) {
    return items.map((item) => task(item, random));
  }

  const streams = items.map(() => random.fork());
  return items.map((item, i) => task(item, streams[i] ?? random));
}

/**
 * Indices 0..count-1, for tasks that only need a repetition number
 */
export function repetitions(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}
