/**
 * CLI options parsing tests
 */

import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseInteger } from '../cli.js';
import { InputError } from '../errors/index.js';

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse config option', () => {
      expect(parseCliOptions({ config: './tilewise.json' }).config).toBe('./tilewise.json');
    });

    it('should parse agent option', () => {
      expect(parseCliOptions({ agent: 'random' }).agent).toBe('random');
      expect(parseCliOptions({ agent: 'random-tree' }).agent).toBe('random-tree');
      expect(parseCliOptions({ agent: 'expectimax' }).agent).toBe('expectimax');
    });

    it('should parse profile option', () => {
      expect(parseCliOptions({ profile: 'quick' }).profile).toBe('quick');
      expect(parseCliOptions({ profile: 'deep' }).profile).toBe('deep');
    });

    it('should return an empty object for no options', () => {
      expect(parseCliOptions({})).toEqual({});
    });
  });

  describe('search sizes', () => {
    it('should copy numeric options', () => {
      const result = parseCliOptions({
        seed: 42,
        sims: 10,
        depth: 3,
        tiles: 5,
        heuristicSims: 2,
        maxEvals: 400,
        maxMoves: 50,
        score: 128,
      });
      expect(result).toEqual({
        seed: 42,
        sims: 10,
        depth: 3,
        tiles: 5,
        heuristicSims: 2,
        maxEvals: 400,
        maxMoves: 50,
        score: 128,
      });
    });

    it('should parse metric and heuristic', () => {
      const result = parseCliOptions({ metric: 'moves', heuristic: 'empty-weighted' });
      expect(result.metric).toBe('moves');
      expect(result.heuristic).toBe('empty-weighted');
    });

    it('should ignore values of the wrong type', () => {
      expect(parseCliOptions({ depth: '3' }).depth).toBeUndefined();
      expect(parseCliOptions({ verbose: 'yes' }).verbose).toBeUndefined();
    });
  });

  describe('invalid choices', () => {
    it('should reject an unknown agent', () => {
      expect(() => parseCliOptions({ agent: 'user' })).toThrow(InputError);
      expect(() => parseCliOptions({ agent: 'user' })).toThrow('Invalid value for --agent: user');
    });

    it('should suggest the accepted values', () => {
      try {
        parseCliOptions({ heuristic: 'corner' });
        expect.unreachable('parseCliOptions should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(InputError);
        if (error instanceof InputError) {
          expect(error.suggestion).toBe('Use one of: rollout, empty-weighted');
          expect(error.exitCode).toBe(2);
        }
      }
    });
  });

  describe('flags', () => {
    it('should parse boolean flags', () => {
      const result = parseCliOptions({ parallel: true, verbose: true, showConfig: true });
      expect(result.parallel).toBe(true);
      expect(result.verbose).toBe(true);
      expect(result.showConfig).toBe(true);
    });

    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });

    it('should parse noBoard when board is false', () => {
      expect(parseCliOptions({ board: false }).noBoard).toBe(true);
      expect(parseCliOptions({ board: true }).noBoard).toBeUndefined();
    });

    it('should pass cells through as text', () => {
      expect(parseCliOptions({ cells: '1,1,0,0' }).cells).toBe('1,1,0,0');
    });
  });
});

describe('parseInteger', () => {
  it('should accept non-negative integers', () => {
    expect(parseInteger('0')).toBe(0);
    expect(parseInteger('250')).toBe(250);
  });

  it('should reject anything else', () => {
    expect(() => parseInteger('')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('-1')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('ten')).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  it('should define play and evaluate commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('tilewise');
    expect(program.commands.map((command) => command.name())).toEqual(['play', 'evaluate']);
  });

  it('should give play its own options beside the search options', () => {
    const play = createProgram().commands.find((command) => command.name() === 'play');
    const flags = play?.options.map((option) => option.long) ?? [];
    expect(flags).toContain('--agent');
    expect(flags).toContain('--max-evals');
    expect(flags).toContain('--max-moves');
    expect(flags).toContain('--no-board');
    expect(flags).not.toContain('--cells');
  });

  it('should require cells for evaluate', () => {
    const evaluate = createProgram().commands.find((command) => command.name() === 'evaluate');
    const cells = evaluate?.options.find((option) => option.long === '--cells');
    expect(cells?.mandatory).toBe(true);
  });
});
