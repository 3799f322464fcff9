/**
 * Maze generation entry point: carve a grid, then place start and goal.
 */

import { MazeGenerationError } from '../core/errors.js';
import type { Position } from '../core/position.js';
import type { Grid } from '../core/types.js';
import { type GameSettings, DEFAULT_SETTINGS } from '../config/settings.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { type Difficulty, type DifficultyPreset, getPreset } from './difficulty.js';
import { generateGrid } from './generator.js';
import { isPlacementFailure, placeStartAndGoal } from './placement.js';
import { type RandomSource, createRandom } from './random.js';

export interface MazeStats {
  /** Walls removed by the carving pass (rows*cols - 1). */
  readonly carved: number;
  /** Walls removed by the complexity pass. */
  readonly extraPassages: number;
  /** Greatest BFS distance from the start. */
  readonly eccentricity: number;
  /** Grids generated, including the one kept. */
  readonly generationAttempts: number;
  /** Placement attempts on the kept grid. */
  readonly placementAttempts: number;
}

/**
 * A generated maze. The grid is frozen; start and goal never change.
 */
export interface Maze {
  readonly difficulty: Difficulty;
  readonly grid: Grid;
  readonly start: Position;
  readonly goal: Position;
  /** BFS distance from start to goal. */
  readonly distance: number;
  readonly stats: MazeStats;
}

export interface GenerateOptions {
  /** Random source for this run. Takes precedence over `seed`. */
  readonly random?: RandomSource;
  /** Seed for a fresh source when `random` is not given. */
  readonly seed?: number;
  readonly settings?: GameSettings;
  readonly logger?: Logger;
}

/**
 * Generate a maze for a difficulty.
 *
 * @throws MazeConfigError for an unknown difficulty
 * @throws MazeGenerationError if no grid yields a valid placement within
 *         `settings.generation.maxAttempts` generations
 */
export function generateMaze(difficulty: Difficulty | string, options: GenerateOptions = {}): Maze {
  return generateFromPreset(getPreset(difficulty), options);
}

/**
 * Generate a maze from preset parameters.
 */
export function generateFromPreset(preset: DifficultyPreset, options: GenerateOptions = {}): Maze {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const logger = options.logger ?? createLogger(settings.logLevel);
  const random = options.random ?? createRandom(options.seed);
  const maxAttempts = settings.generation.maxAttempts;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const { grid, carved, extraPassages } = generateGrid(preset, random);
    const placement = placeStartAndGoal(grid, preset, random, settings.placement);

    if (isPlacementFailure(placement)) {
      logger.warn(`Generation ${attempt}/${maxAttempts} discarded: ${placement.details}`);
      continue;
    }

    logger.debug(
      `Generated ${preset.difficulty} maze ${grid.rows}x${grid.cols}: ` +
      `${carved} carved + ${extraPassages} extra passages, ` +
      `start ${placement.start} goal ${placement.goal} distance ${placement.distance}`
    );

    return Object.freeze({
      difficulty: preset.difficulty,
      grid,
      start: placement.start,
      goal: placement.goal,
      distance: placement.distance,
      stats: Object.freeze({
        carved,
        extraPassages,
        eccentricity: placement.eccentricity,
        generationAttempts: attempt,
        placementAttempts: placement.attempts,
      }),
    });
  }

  const message =
    `Could not place start and goal for ${preset.difficulty} ` +
    `(${preset.rows}x${preset.cols}) after ${maxAttempts} generations`;
  logger.error(message);
  throw new MazeGenerationError(message, maxAttempts);
}
