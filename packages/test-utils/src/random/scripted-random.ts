/**
 * Deterministic random source for tests
 *
 * Returns queued values in order, so a test can say exactly which empty cell a
 * spawn lands on and whether it is a 2 or a 4.
 */

import type { RandomSource } from '@tilewise/core';

/**
 * Queued values for a ScriptedRandom
 */
export interface RandomScript {
  /** Results of nextInt, in order */
  ints?: number[];
  /** Results of nextFloat, in order */
  floats?: number[];
}

/**
 * A spawn described by its position among the empty cells (ascending index)
 * and whether it is a 4
 */
export interface ScriptedSpawn {
  emptyIndex: number;
  four?: boolean;
}

/**
 * Random source that replays a script and fails loudly when it runs out
 */
export class ScriptedRandom implements RandomSource {
  private readonly ints: number[];
  private readonly floats: number[];
  private intCalls = 0;
  private floatCalls = 0;

  constructor(script: RandomScript = {}) {
    this.ints = [...(script.ints ?? [])];
    this.floats = [...(script.floats ?? [])];
  }

  nextUint32(): number {
    return Math.floor(this.nextFloat() * 0x100000000);
  }

  nextFloat(): number {
    const value = this.floats.shift();
    if (value === undefined) {
      throw new Error(`ScriptedRandom ran out of floats after ${this.floatCalls} draws`);
    }
    this.floatCalls += 1;
    return value;
  }

  nextInt(bound: number): number {
    const value = this.ints.shift();
    if (value === undefined) {
      throw new Error(`ScriptedRandom ran out of ints after ${this.intCalls} draws`);
    }
    if (!Number.isInteger(value) || value < 0 || value >= bound) {
      throw new Error(`Scripted int ${value} is outside [0, ${bound})`);
    }
    this.intCalls += 1;
    return value;
  }

  /** Forks share the script */
  fork(): RandomSource {
    return this;
  }

  /**
   * Whether every queued value has been used
   */
  get finished(): boolean {
    return this.ints.length === 0 && this.floats.length === 0;
  }

  get draws(): { ints: number; floats: number } {
    return { ints: this.intCalls, floats: this.floatCalls };
  }
}

/**
 * Random source for a sequence of spawns: a cell draw then a value draw each
 */
export function scriptSpawns(spawns: readonly ScriptedSpawn[]): ScriptedRandom {
  return new ScriptedRandom({
    ints: spawns.map((spawn) => spawn.emptyIndex),
    floats: spawns.map((spawn) => (spawn.four === true ? 0.95 : 0.5)),
  });
}
