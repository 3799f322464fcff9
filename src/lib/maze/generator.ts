/**
 * Maze carving.
 *
 * Two passes over a fully walled grid:
 * 1. Carve: depth-first backtracking produces a perfect maze (a spanning
 *    tree of the cell graph).
 * 2. Adjust: optionally open more walls to introduce loops.
 */

import { MazeConfigError } from '../core/errors.js';
import { Position } from '../core/position.js';
import {
  type Grid,
  type MutableGrid,
  createGrid,
  freezeGrid,
  isInBounds,
  neighborsOf,
  removeWall,
} from '../core/types.js';
import type { DifficultyPreset } from './difficulty.js';
import { type RandomSource, pick, randomInt } from './random.js';

/**
 * The parameters generation needs from a preset.
 */
export type GridShape = Pick<DifficultyPreset, 'rows' | 'cols' | 'removalProbability'>;

export interface GeneratedGrid {
  readonly grid: Grid;
  /** Walls removed by the carving pass; always rows*cols - 1. */
  readonly carved: number;
  /** Walls removed by the complexity pass. */
  readonly extraPassages: number;
}

/**
 * Carve a perfect maze into a fully walled grid using recursive
 * backtracking, run on an explicit stack.
 *
 * At each step the cell on top of the stack opens the wall to a uniformly
 * chosen unvisited neighbor and descends into it; a cell with no unvisited
 * neighbors is popped.
 *
 * @param origin - Cell the walk starts from; random when omitted
 * @returns Number of walls removed
 */
export function carvePerfectMaze(
  grid: MutableGrid,
  random: RandomSource,
  origin: Position = new Position(randomInt(random, grid.rows), randomInt(random, grid.cols))
): number {
  if (!isInBounds(grid, origin)) {
    throw new Error(`Carving origin out of bounds: ${origin}`);
  }

  const visited = grid.cells.map(line => line.map(() => false));
  const stack: Position[] = [origin];
  visited[origin.row][origin.col] = true;
  let carved = 0;

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    const unvisited = neighborsOf(grid, current).filter(
      n => !visited[n.position.row][n.position.col]
    );

    if (unvisited.length === 0) {
      // Dead end - backtrack
      stack.pop();
      continue;
    }

    const chosen = pick(random, unvisited);
    removeWall(grid, current, chosen.position);
    visited[chosen.position.row][chosen.position.col] = true;
    stack.push(chosen.position);
    carved++;
  }

  return carved;
}

/**
 * Open each interior wall that is still standing with the given
 * probability. Pairs are visited once each, row-major, right before down.
 *
 * Never adds a wall, so connectivity is preserved.
 *
 * @returns Number of walls removed
 * @throws MazeConfigError if probability is outside [0, 1]
 */
export function adjustComplexity(
  grid: MutableGrid,
  probability: number,
  random: RandomSource
): number {
  if (!(probability >= 0 && probability <= 1)) {
    throw new MazeConfigError(`Wall removal probability must be within [0, 1], got ${probability}`);
  }
  if (probability === 0) {
    return 0;
  }

  let removed = 0;
  for (let r = 0; r < grid.rows; r++) {
    for (let c = 0; c < grid.cols; c++) {
      const walls = grid.cells[r][c].walls;
      const here = new Position(r, c);

      if (c < grid.cols - 1 && walls.right && random.next() < probability) {
        removeWall(grid, here, new Position(r, c + 1));
        removed++;
      }
      if (r < grid.rows - 1 && walls.bottom && random.next() < probability) {
        removeWall(grid, here, new Position(r + 1, c));
        removed++;
      }
    }
  }
  return removed;
}

/**
 * Build, carve, adjust and freeze a grid.
 *
 * @throws MazeConfigError for invalid dimensions or probability, before
 *         any carving happens
 */
export function generateGrid(shape: GridShape, random: RandomSource): GeneratedGrid {
  const grid = createGrid(shape.rows, shape.cols);
  if (!(shape.removalProbability >= 0 && shape.removalProbability <= 1)) {
    throw new MazeConfigError(
      `Wall removal probability must be within [0, 1], got ${shape.removalProbability}`
    );
  }

  const carved = carvePerfectMaze(grid, random);
  const extraPassages = adjustComplexity(grid, shape.removalProbability, random);

  return { grid: freezeGrid(grid), carved, extraPassages };
}
