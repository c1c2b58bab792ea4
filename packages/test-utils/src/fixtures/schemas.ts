/**
 * Shapes of the JSON fixtures
 */

import { MOVES } from '@tilewise/core';
import { z } from 'zod';

const exponent = z.number().int().min(0).max(31);
const line = z.array(exponent).length(4);

export const moveSchema = z.enum(MOVES);

/**
 * One line slid in one direction
 */
export const mergeCaseSchema = z.object({
  name: z.string(),
  /** Row cases use row 0 with left/right; column cases use column 0 with up/down */
  axis: z.enum(['row', 'column']),
  line,
  move: moveSchema,
  expected: line,
  gained: z.number().int().min(0),
});

export const mergeCasesSchema = z.array(mergeCaseSchema);

export type MergeCase = z.infer<typeof mergeCaseSchema>;

/**
 * A game replayed from an empty board with scripted spawns
 */
export const scenarioSchema = z.object({
  name: z.string(),
  setup: z.array(z.object({ x: z.number().int(), y: z.number().int(), exponent })),
  random: z.object({
    ints: z.array(z.number().int()),
    floats: z.array(z.number()),
  }),
  steps: z.array(z.object({ move: moveSchema, changed: z.boolean() })),
  expected: z.object({
    rows: z.array(line).length(4),
    score: z.number().int(),
    numMoves: z.number().int(),
    gameOver: z.boolean(),
  }),
});

export type Scenario = z.infer<typeof scenarioSchema>;
