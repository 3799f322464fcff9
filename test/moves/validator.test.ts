/**
 * Tests for move validation.
 */

import { describe, it, expect } from 'vitest';
import { DIRECTIONS, Direction, flipDirection } from '../../src/lib/core/direction.js';
import { Position } from '../../src/lib/core/position.js';
import { createGrid, freezeGrid, removeWall } from '../../src/lib/core/types.js';
import { Difficulty } from '../../src/lib/maze/difficulty.js';
import { generateMaze } from '../../src/lib/maze/maze.js';
import { isMoveFailure } from '../../src/lib/moves/failure.js';
import { isValidMove, tryMove } from '../../src/lib/moves/validator.js';
import { parseMaze } from '../../src/lib/parser/parser.js';

// The four interior walls of a 2x2 grid, as [a, b, direction from a to b]
const INTERIOR: ReadonlyArray<readonly [Position, Position, Direction]> = [
  [new Position(0, 0), new Position(0, 1), Direction.Right],
  [new Position(1, 0), new Position(1, 1), Direction.Right],
  [new Position(0, 0), new Position(1, 0), Direction.Down],
  [new Position(0, 1), new Position(1, 1), Direction.Down],
];

describe('TestIsValidMove', () => {
  it('test_allows_moves_through_removed_walls_only', () => {
    const grid = createGrid(2, 2);
    removeWall(grid, new Position(0, 0), new Position(0, 1));
    const frozen = freezeGrid(grid);

    expect(isValidMove(frozen, new Position(0, 0), Direction.Right)).toBe(true);
    expect(isValidMove(frozen, new Position(0, 1), Direction.Left)).toBe(true);
    expect(isValidMove(frozen, new Position(0, 0), Direction.Down)).toBe(false);
  });

  it('test_agrees_with_every_combination_of_interior_walls', () => {
    for (let mask = 0; mask < 16; mask++) {
      const grid = createGrid(2, 2);
      INTERIOR.forEach(([a, b], bit) => {
        if (mask & (1 << bit)) removeWall(grid, a, b);
      });
      const frozen = freezeGrid(grid);

      for (let row = 0; row < 2; row++) {
        for (let col = 0; col < 2; col++) {
          const from = new Position(row, col);
          for (const direction of DIRECTIONS) {
            const target = from.step(direction);
            const open = INTERIOR.some(
              ([a, b], bit) =>
                (mask & (1 << bit)) !== 0 &&
                ((a.equals(from) && b.equals(target)) || (b.equals(from) && a.equals(target)))
            );
            expect(isValidMove(frozen, from, direction)).toBe(open);
          }
        }
      }
    }
  });

  it('test_never_leaves_a_generated_maze_across_its_border', () => {
    const { grid } = generateMaze(Difficulty.EASY, { seed: 21 });

    for (let i = 0; i < 10; i++) {
      expect(isValidMove(grid, new Position(0, i), Direction.Up)).toBe(false);
      expect(isValidMove(grid, new Position(9, i), Direction.Down)).toBe(false);
      expect(isValidMove(grid, new Position(i, 0), Direction.Left)).toBe(false);
      expect(isValidMove(grid, new Position(i, 9), Direction.Right)).toBe(false);
    }
  });

  it('test_is_symmetric_across_every_passage_of_a_generated_maze', () => {
    const { grid } = generateMaze(Difficulty.MEDIUM, { seed: 4 });

    for (let row = 0; row < grid.rows; row++) {
      for (let col = 0; col < grid.cols; col++) {
        const from = new Position(row, col);
        for (const direction of DIRECTIONS) {
          if (isValidMove(grid, from, direction)) {
            expect(isValidMove(grid, from.step(direction), flipDirection(direction))).toBe(true);
          }
        }
      }
    }
  });

  it('test_fails_closed_on_positions_outside_the_grid', () => {
    const grid = freezeGrid(createGrid(2, 2));
    expect(isValidMove(grid, new Position(-1, 0), Direction.Down)).toBe(false);
    expect(isValidMove(grid, new Position(2, 2), Direction.Up)).toBe(false);
    expect(isValidMove(grid, new Position(0, 5), Direction.Left)).toBe(false);
    expect(isValidMove(grid, new Position(0.5, 0), Direction.Down)).toBe(false);
    expect(isValidMove(grid, new Position(0, Number.NaN), Direction.Right)).toBe(false);
    expect(tryMove(grid, new Position(Number.NaN, 1), Direction.Up)).toEqual({
      reason: 'OUT_OF_BOUNDS',
      position: new Position(Number.NaN, 1),
      direction: 'up',
    });
  });

  it('test_fails_closed_on_unknown_directions', () => {
    const grid = createGrid(1, 2);
    removeWall(grid, new Position(0, 0), new Position(0, 1));
    const frozen = freezeGrid(grid);

    expect(isValidMove(frozen, new Position(0, 0), 'RIGHT')).toBe(false);
    expect(isValidMove(frozen, new Position(0, 0), 'jump')).toBe(false);
    expect(isValidMove(frozen, new Position(0, 0), '')).toBe(false);
  });
});

describe('TestTryMove', () => {
  const { grid } = parseMaze(['+-+-+', '|   |', '+-+ +', '|   |', '+-+-+'].join('\n'));

  it('test_returns_the_target_of_an_allowed_move', () => {
    const result = tryMove(grid, new Position(0, 1), Direction.Down);
    expect(result).toEqual(new Position(1, 1));
  });

  it('test_explains_why_a_move_was_rejected', () => {
    const from = new Position(0, 0);

    expect(tryMove(grid, from, Direction.Down)).toEqual({ reason: 'WALL', position: from, direction: 'down' });
    expect(tryMove(grid, from, Direction.Up)).toEqual({ reason: 'OUT_OF_BOUNDS', position: from, direction: 'up' });
    expect(tryMove(grid, from, 'north')).toEqual({
      reason: 'INVALID_DIRECTION',
      position: from,
      direction: 'north',
    });
  });

  it('test_reports_the_border_even_where_its_wall_is_open', () => {
    const { grid: gap } = parseMaze('+ +\n| |\n+-+');
    const result = tryMove(gap, new Position(0, 0), Direction.Up);

    expect(isMoveFailure(result)).toBe(true);
    if (isMoveFailure(result)) {
      expect(result.reason).toBe('OUT_OF_BOUNDS');
    }
  });
});
