/**
 * Wall-collision rules for single-cell moves.
 *
 * Pure functions over a frozen grid; safe to call from any number of
 * readers.
 */

import { isDirection } from '../core/direction.js';
import type { Position } from '../core/position.js';
import { type Grid, WALL_FACING, isInBounds } from '../core/types.js';
import { type MoveFailure, isMoveFailure } from './failure.js';

/**
 * Attempt a move.
 *
 * `direction` is a string so raw input can be passed straight through;
 * anything that is not a Direction value is rejected.
 *
 * @returns The target position, or a MoveFailure explaining the rejection
 */
export function tryMove(grid: Grid, from: Position, direction: string): Position | MoveFailure {
  if (!isDirection(direction)) {
    return { reason: 'INVALID_DIRECTION', position: from, direction };
  }

  const target = from.step(direction);
  if (!isInBounds(grid, from) || !isInBounds(grid, target)) {
    return { reason: 'OUT_OF_BOUNDS', position: from, direction };
  }

  if (grid.cells[from.row][from.col].walls[WALL_FACING[direction]]) {
    return { reason: 'WALL', position: from, direction };
  }

  return target;
}

/**
 * Check whether a move from `from` in `direction` is allowed.
 *
 * Fails closed: an out-of-bounds source or target and an unrecognised
 * direction all return false. Otherwise true iff the wall of `from`
 * facing `direction` is absent.
 */
export function isValidMove(grid: Grid, from: Position, direction: string): boolean {
  return !isMoveFailure(tryMove(grid, from, direction));
}
