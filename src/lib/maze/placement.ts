/**
 * Start/goal placement.
 */

import { Position } from '../core/position.js';
import type { Grid } from '../core/types.js';
import type { DifficultyPreset } from './difficulty.js';
import { bfsDistances } from './distance.js';
import { type RandomSource, pick, randomInt } from './random.js';

/**
 * How the goal is chosen among cells far enough from the start.
 * - farthest: first cell at the start's eccentricity, row-major
 * - random: any cell at or beyond the threshold
 */
export type GoalStrategy = 'farthest' | 'random';

export interface PlacementOptions {
  readonly goalStrategy: GoalStrategy;
  readonly maxAttempts: number;
}

export const DEFAULT_PLACEMENT_OPTIONS: PlacementOptions = Object.freeze({
  goalStrategy: 'farthest',
  maxAttempts: 8,
});

export interface Placement {
  readonly start: Position;
  readonly goal: Position;
  /** BFS distance from start to goal. */
  readonly distance: number;
  /** Greatest BFS distance from start. */
  readonly eccentricity: number;
  /** Attempts used, 1-based. */
  readonly attempts: number;
}

export interface PlacementFailure {
  readonly reason: 'EXHAUSTED';
  readonly attempts: number;
  readonly details: string;
}

export function isPlacementFailure(value: Placement | PlacementFailure): value is PlacementFailure {
  return 'reason' in value;
}

/**
 * Minimum start-to-goal distance for a start with the given eccentricity.
 */
export function requiredDistance(eccentricity: number, minPathFraction: number): number {
  return Math.max(1, Math.ceil(eccentricity * minPathFraction));
}

/**
 * Choose a start and goal whose BFS distance meets the preset's minimum.
 *
 * Each attempt picks a random start, measures distances to every cell and
 * keeps the cells at or beyond `requiredDistance`. A start with nothing
 * reachable (only possible on a 1x1 grid) fails the attempt.
 */
export function placeStartAndGoal(
  grid: Grid,
  preset: Pick<DifficultyPreset, 'minPathFraction'>,
  random: RandomSource,
  options: PlacementOptions = DEFAULT_PLACEMENT_OPTIONS
): Placement | PlacementFailure {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const start = new Position(randomInt(random, grid.rows), randomInt(random, grid.cols));
    const distances = bfsDistances(grid, start);
    if (distances.eccentricity === 0) {
      continue;
    }

    const threshold = requiredDistance(distances.eccentricity, preset.minPathFraction);
    const candidates =
      options.goalStrategy === 'farthest' ? distances.farthest() : distances.atLeast(threshold);
    if (candidates.length === 0) {
      continue;
    }

    const goal = options.goalStrategy === 'farthest' ? candidates[0] : pick(random, candidates);
    const distance = distances.get(goal);
    if (distance === undefined || distance < threshold) {
      continue;
    }

    return { start, goal, distance, eccentricity: distances.eccentricity, attempts: attempt };
  }

  return {
    reason: 'EXHAUSTED',
    attempts: options.maxAttempts,
    details:
      `No start/goal pair met the minimum distance after ${options.maxAttempts} attempts ` +
      `on a ${grid.rows}x${grid.cols} grid (minPathFraction=${preset.minPathFraction})`,
  };
}
