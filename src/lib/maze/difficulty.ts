/**
 * Difficulty presets.
 *
 * Differences between tiers are purely parametric, so the presets are a
 * lookup table rather than a class hierarchy.
 */

import { MazeConfigError } from '../core/errors.js';

export enum Difficulty {
  EASY = 'EASY',
  MEDIUM = 'MEDIUM',
  HARD = 'HARD',
  VERY_HARD = 'VERY_HARD',
}

export interface DifficultyPreset {
  readonly difficulty: Difficulty;
  readonly rows: number;
  readonly cols: number;
  /** Chance of opening each remaining interior wall after carving. */
  readonly removalProbability: number;
  /** Goal must be at least this fraction of the start's eccentricity away. */
  readonly minPathFraction: number;
  readonly label: string;
  readonly description: string;
}

export const DIFFICULTY_PRESETS: Readonly<Record<Difficulty, DifficultyPreset>> = Object.freeze({
  [Difficulty.EASY]: Object.freeze({
    difficulty: Difficulty.EASY,
    rows: 10,
    cols: 10,
    removalProbability: 0.3,
    minPathFraction: 0.6,
    label: 'Easy',
    description: '10x10 maze, simple paths',
  }),
  [Difficulty.MEDIUM]: Object.freeze({
    difficulty: Difficulty.MEDIUM,
    rows: 20,
    cols: 20,
    removalProbability: 0.15,
    minPathFraction: 0.6,
    label: 'Medium',
    description: '20x20 maze, moderate complexity',
  }),
  [Difficulty.HARD]: Object.freeze({
    difficulty: Difficulty.HARD,
    rows: 30,
    cols: 30,
    removalProbability: 0.05,
    minPathFraction: 0.6,
    label: 'Hard',
    description: '30x30 maze, complex paths',
  }),
  [Difficulty.VERY_HARD]: Object.freeze({
    difficulty: Difficulty.VERY_HARD,
    rows: 40,
    cols: 40,
    removalProbability: 0,
    minPathFraction: 0.6,
    label: 'Very Hard',
    description: '40x40 maze, maximum complexity',
  }),
});

/**
 * Difficulties from easiest to hardest, in menu order.
 */
export const DIFFICULTIES: ReadonlyArray<Difficulty> = Object.freeze([
  Difficulty.EASY,
  Difficulty.MEDIUM,
  Difficulty.HARD,
  Difficulty.VERY_HARD,
]);

export function isDifficulty(value: unknown): value is Difficulty {
  return DIFFICULTIES.some(d => d === value);
}

/**
 * Look up the preset for a difficulty key.
 *
 * @throws MazeConfigError for keys outside the table
 */
export function getPreset(difficulty: string): DifficultyPreset {
  if (!isDifficulty(difficulty)) {
    throw new MazeConfigError(
      `Unknown difficulty: '${difficulty}'\n` +
      `  Valid difficulties: ${DIFFICULTIES.join(', ')}`
    );
  }
  return DIFFICULTY_PRESETS[difficulty];
}
