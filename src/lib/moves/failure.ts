/**
 * Move failure information.
 */

import type { Position } from '../core/position.js';

/**
 * Reasons why a move can be rejected.
 */
export type MoveFailureReason =
  | 'OUT_OF_BOUNDS'
  | 'WALL'
  | 'INVALID_DIRECTION'
  | 'GAME_OVER';

/**
 * Information about a rejected move. The player stays where they were.
 */
export interface MoveFailure {
  readonly reason: MoveFailureReason;
  readonly position: Position;
  readonly direction: string;
}

/**
 * Type guard to check if a result is a MoveFailure.
 */
export function isMoveFailure(value: unknown): value is MoveFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'reason' in value &&
    'position' in value
  );
}
