/**
 * Tests for BFS distances and shortest paths.
 */

import { describe, it, expect } from 'vitest';
import { Direction } from '../../src/lib/core/direction.js';
import { Position } from '../../src/lib/core/position.js';
import { bfsDistances, shortestPath } from '../../src/lib/maze/distance.js';
import { parseMaze } from '../../src/lib/parser/parser.js';

// (0,0) → (0,1) → (0,2) → (1,2) → (1,1) → (1,0)
const CORRIDOR = [
  '+-+-+-+',
  '|S    |',
  '+-+-+ +',
  '|G    |',
  '+-+-+-+',
].join('\n');

const OPEN_SQUARE = [
  '+-+-+',
  '|   |',
  '+ + +',
  '|   |',
  '+-+-+',
].join('\n');

const SPLIT = [
  '+-+-+',
  '| | |',
  '+-+-+',
].join('\n');

describe('TestBfsDistances', () => {
  it('test_measures_distances_along_the_corridor', () => {
    const { grid } = parseMaze(CORRIDOR);
    const distances = bfsDistances(grid, new Position(0, 0));

    expect(distances.get(new Position(0, 0))).toBe(0);
    expect(distances.get(new Position(0, 1))).toBe(1);
    expect(distances.get(new Position(0, 2))).toBe(2);
    expect(distances.get(new Position(1, 2))).toBe(3);
    expect(distances.get(new Position(1, 1))).toBe(4);
    expect(distances.get(new Position(1, 0))).toBe(5);
    expect(distances.size).toBe(6);
    expect(distances.eccentricity).toBe(5);
  });

  it('test_lists_far_cells_in_row_major_order', () => {
    const { grid } = parseMaze(CORRIDOR);
    const distances = bfsDistances(grid, new Position(0, 0));

    expect(distances.farthest()).toEqual([new Position(1, 0)]);
    expect(distances.atLeast(3)).toEqual([new Position(1, 0), new Position(1, 1), new Position(1, 2)]);
  });

  it('test_uses_the_shorter_route_when_the_maze_has_loops', () => {
    const { grid } = parseMaze(OPEN_SQUARE);
    const distances = bfsDistances(grid, new Position(0, 0));

    expect(distances.get(new Position(1, 1))).toBe(2);
    expect(distances.eccentricity).toBe(2);
    expect(distances.farthest()).toEqual([new Position(1, 1)]);
  });

  it('test_leaves_walled_off_cells_unreached', () => {
    const { grid } = parseMaze(SPLIT);
    const distances = bfsDistances(grid, new Position(0, 0));

    expect(distances.size).toBe(1);
    expect(distances.eccentricity).toBe(0);
    expect(distances.has(new Position(0, 1))).toBe(false);
    expect(distances.get(new Position(0, 1))).toBeUndefined();
    expect(distances.get(new Position(4, 4))).toBeUndefined();
  });

  it('test_rejects_an_origin_outside_the_grid', () => {
    const { grid } = parseMaze(SPLIT);
    expect(() => bfsDistances(grid, new Position(0, 2))).toThrow(/out of bounds/);
  });
});

describe('TestShortestPath', () => {
  it('test_returns_the_moves_through_the_corridor', () => {
    const { grid, start, goal } = parseMaze(CORRIDOR);
    expect(start).toBeDefined();
    expect(goal).toBeDefined();
    if (!start || !goal) return;

    expect(shortestPath(grid, start, goal)).toEqual([
      Direction.Right,
      Direction.Right,
      Direction.Down,
      Direction.Left,
      Direction.Left,
    ]);
  });

  it('test_returns_a_two_move_route_across_an_open_square', () => {
    const { grid } = parseMaze(OPEN_SQUARE);
    const path = shortestPath(grid, new Position(0, 0), new Position(1, 1));
    expect(path?.length).toBe(2);
  });

  it('test_returns_an_empty_route_to_the_same_cell', () => {
    const { grid } = parseMaze(CORRIDOR);
    expect(shortestPath(grid, new Position(1, 1), new Position(1, 1))).toEqual([]);
  });

  it('test_returns_null_when_the_goal_cannot_be_reached', () => {
    const { grid } = parseMaze(SPLIT);
    expect(shortestPath(grid, new Position(0, 0), new Position(0, 1))).toBeNull();
    expect(shortestPath(grid, new Position(0, 0), new Position(3, 3))).toBeNull();
  });
});
