/**
 * Core data structures for maze grids.
 */

import { Direction, DIRECTIONS, flipDirection } from './direction.js';
import { MazeConfigError } from './errors.js';
import { Position } from './position.js';

// =============================================================================
// Cell Types
// =============================================================================

/**
 * Wall flags of a single cell. `true` means the wall is standing.
 */
export interface Walls {
  top: boolean;
  right: boolean;
  bottom: boolean;
  left: boolean;
}

export type WallSide = keyof Walls;

/**
 * Which wall of a cell faces each direction.
 */
export const WALL_FACING: Readonly<Record<Direction, WallSide>> = Object.freeze({
  [Direction.Up]: 'top',
  [Direction.Right]: 'right',
  [Direction.Down]: 'bottom',
  [Direction.Left]: 'left',
});

/**
 * A cell whose walls may still be carved. Only generation code sees these.
 */
export interface MutableCell {
  readonly row: number;
  readonly col: number;
  readonly walls: Walls;
}

/**
 * A read-only cell, as exposed once generation has finished.
 */
export interface Cell {
  readonly row: number;
  readonly col: number;
  readonly walls: Readonly<Walls>;
}

// =============================================================================
// Grid Structure
// =============================================================================

/**
 * Grid under construction. Cells are addressed `cells[row][col]`.
 */
export interface MutableGrid {
  readonly rows: number;
  readonly cols: number;
  readonly cells: ReadonlyArray<ReadonlyArray<MutableCell>>;
}

/**
 * A finished, read-only grid. Every MutableGrid is also a Grid, so
 * read helpers accept either.
 */
export interface Grid {
  readonly rows: number;
  readonly cols: number;
  readonly cells: ReadonlyArray<ReadonlyArray<Cell>>;
}

/**
 * An in-bounds neighbor together with the direction leading to it.
 */
export interface Neighbor {
  readonly position: Position;
  readonly direction: Direction;
}

/**
 * Create a grid with every wall of every cell standing.
 *
 * @throws MazeConfigError if either dimension is not a positive integer
 */
export function createGrid(rows: number, cols: number): MutableGrid {
  if (!Number.isInteger(rows) || rows < 1) {
    throw new MazeConfigError(`Grid must have at least one row, got rows=${rows}`);
  }
  if (!Number.isInteger(cols) || cols < 1) {
    throw new MazeConfigError(`Grid must have at least one column, got cols=${cols}`);
  }

  const cells: MutableCell[][] = [];
  for (let row = 0; row < rows; row++) {
    const line: MutableCell[] = [];
    for (let col = 0; col < cols; col++) {
      line.push({ row, col, walls: { top: true, right: true, bottom: true, left: true } });
    }
    cells.push(line);
  }

  return { rows, cols, cells };
}

/**
 * Deep-freeze a grid once generation is complete.
 */
export function freezeGrid(grid: MutableGrid): Grid {
  const cells = Object.freeze(
    grid.cells.map(line =>
      Object.freeze(
        line.map(cell =>
          Object.freeze({ row: cell.row, col: cell.col, walls: Object.freeze({ ...cell.walls }) })
        )
      )
    )
  );
  return Object.freeze({ rows: grid.rows, cols: grid.cols, cells });
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Whether a position names a cell of the grid. Fractional and NaN
 * coordinates never do.
 */
export function isInBounds(grid: Grid, pos: Position): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < grid.rows &&
    pos.col >= 0 &&
    pos.col < grid.cols
  );
}

/**
 * Get the cell at a position.
 *
 * @returns The cell, or undefined if position is out of bounds
 */
export function getCell(grid: Grid, pos: Position): Cell | undefined {
  if (!isInBounds(grid, pos)) {
    return undefined;
  }
  return grid.cells[pos.row][pos.col];
}

/**
 * Wall flags of the cell at a position.
 *
 * @throws Error if position is out of bounds
 */
export function wallsAt(grid: Grid, pos: Position): Readonly<Walls> {
  const cell = getCell(grid, pos);
  if (!cell) {
    throw new Error(`Position out of bounds: ${pos} in ${grid.rows}x${grid.cols} grid`);
  }
  return cell.walls;
}

/**
 * Grid size as `[rows, cols]`.
 */
export function dimensions(grid: Grid): readonly [number, number] {
  return [grid.rows, grid.cols];
}

/**
 * Whether the wall of `pos` facing `direction` is standing.
 * Positions outside the grid count as walled.
 */
export function hasWall(grid: Grid, pos: Position, direction: Direction): boolean {
  const cell = getCell(grid, pos);
  return cell === undefined || cell.walls[WALL_FACING[direction]];
}

/**
 * The up to four in-bounds neighbors of a position, walls ignored.
 */
export function neighborsOf(grid: Grid, pos: Position): Neighbor[] {
  const result: Neighbor[] = [];
  for (const direction of DIRECTIONS) {
    const position = pos.step(direction);
    if (isInBounds(grid, position)) {
      result.push({ position, direction });
    }
  }
  return result;
}

/**
 * Neighbors reachable from `pos` without crossing a wall.
 */
export function openNeighborsOf(grid: Grid, pos: Position): Neighbor[] {
  return neighborsOf(grid, pos).filter(n => !hasWall(grid, pos, n.direction));
}

/**
 * Number of open interior walls, i.e. edges of the carved graph.
 */
export function countPassages(grid: Grid): number {
  let count = 0;
  for (let r = 0; r < grid.rows; r++) {
    for (let c = 0; c < grid.cols; c++) {
      const walls = grid.cells[r][c].walls;
      if (c < grid.cols - 1 && !walls.right) count++;
      if (r < grid.rows - 1 && !walls.bottom) count++;
    }
  }
  return count;
}

// =============================================================================
// Mutation
// =============================================================================

/**
 * Carve the wall between two adjacent cells, clearing both sides.
 *
 * @returns true if a wall was standing, false if the passage was already open
 * @throws Error if the positions are not adjacent cells of the grid
 */
export function removeWall(grid: MutableGrid, a: Position, b: Position): boolean {
  if (!isInBounds(grid, a) || !isInBounds(grid, b)) {
    throw new Error(`Cannot remove wall between ${a} and ${b}: out of bounds`);
  }

  const direction = DIRECTIONS.find(dir => a.step(dir).equals(b));
  if (direction === undefined) {
    throw new Error(`Cannot remove wall between ${a} and ${b}: cells are not adjacent`);
  }

  const from = grid.cells[a.row][a.col].walls;
  const to = grid.cells[b.row][b.col].walls;
  const side = WALL_FACING[direction];
  const wasStanding = from[side];

  from[side] = false;
  to[WALL_FACING[flipDirection(direction)]] = false;
  return wasStanding;
}
