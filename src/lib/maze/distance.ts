/**
 * Breadth-first search over the carved maze graph.
 *
 * Two cells are connected iff they are adjacent and no wall separates them.
 */

import { Direction, flipDirection } from '../core/direction.js';
import { Position } from '../core/position.js';
import { type Grid, isInBounds, openNeighborsOf } from '../core/types.js';

const UNREACHED = -1;

/**
 * Shortest-path distances from a single origin cell.
 */
export class DistanceMap {
  /** Greatest distance to any reachable cell. */
  public readonly eccentricity: number;

  /** Number of reachable cells, origin included. */
  public readonly size: number;

  constructor(
    public readonly origin: Position,
    private readonly distances: ReadonlyArray<ReadonlyArray<number>>
  ) {
    let max = 0;
    let size = 0;
    for (const line of distances) {
      for (const d of line) {
        if (d === UNREACHED) continue;
        size++;
        if (d > max) max = d;
      }
    }
    this.eccentricity = max;
    this.size = size;
  }

  /**
   * @returns The distance to `pos`, or undefined if unreachable or out of bounds
   */
  get(pos: Position): number | undefined {
    const d = this.distances[pos.row]?.[pos.col];
    return d === undefined || d === UNREACHED ? undefined : d;
  }

  has(pos: Position): boolean {
    return this.get(pos) !== undefined;
  }

  /**
   * Reachable positions at distance >= `min`, in row-major order.
   */
  atLeast(min: number): Position[] {
    const result: Position[] = [];
    this.distances.forEach((line, row) => {
      line.forEach((d, col) => {
        if (d !== UNREACHED && d >= min) {
          result.push(new Position(row, col));
        }
      });
    });
    return result;
  }

  /**
   * Positions at the eccentricity, in row-major order.
   */
  farthest(): Position[] {
    return this.atLeast(this.eccentricity);
  }
}

/**
 * Distances from `from` to every cell reachable through open walls.
 *
 * @throws Error if `from` is out of bounds
 */
export function bfsDistances(grid: Grid, from: Position): DistanceMap {
  if (!isInBounds(grid, from)) {
    throw new Error(`BFS origin out of bounds: ${from}`);
  }

  const distances = grid.cells.map(line => line.map(() => UNREACHED));
  distances[from.row][from.col] = 0;

  const queue: Position[] = [from];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const next = distances[current.row][current.col] + 1;

    for (const { position } of openNeighborsOf(grid, current)) {
      if (distances[position.row][position.col] === UNREACHED) {
        distances[position.row][position.col] = next;
        queue.push(position);
      }
    }
  }

  return new DistanceMap(from, distances);
}

/**
 * Directions of one shortest route from `from` to `to`.
 *
 * @returns The moves in order (empty when from equals to), or null if `to`
 *          cannot be reached
 */
export function shortestPath(grid: Grid, from: Position, to: Position): Direction[] | null {
  if (!isInBounds(grid, from) || !isInBounds(grid, to)) {
    return null;
  }

  // Direction taken to first reach each cell
  const arrivedBy: Array<Array<Direction | null>> = grid.cells.map(line => line.map(() => null));
  const seen = grid.cells.map(line => line.map(() => false));
  seen[from.row][from.col] = true;

  const queue: Position[] = [from];
  for (let head = 0; head < queue.length && !seen[to.row][to.col]; head++) {
    const current = queue[head];
    for (const { position, direction } of openNeighborsOf(grid, current)) {
      if (!seen[position.row][position.col]) {
        seen[position.row][position.col] = true;
        arrivedBy[position.row][position.col] = direction;
        queue.push(position);
      }
    }
  }

  if (!seen[to.row][to.col]) {
    return null;
  }

  const path: Direction[] = [];
  let cursor = to;
  let step = arrivedBy[cursor.row][cursor.col];
  while (step !== null) {
    path.push(step);
    cursor = cursor.step(flipDirection(step));
    step = arrivedBy[cursor.row][cursor.col];
  }
  return path.reverse();
}
