/**
 * Plain-text wall layout for building test fixtures and comparing
 * generated layouts.
 *
 * Internal tooling: not exported from the package entry point, and not a
 * format for saving mazes.
 */

import { MazeParseError } from '../core/errors.js';
import { Position } from '../core/position.js';
import { type Grid, type MutableGrid, createGrid, freezeGrid, removeWall } from '../core/types.js';

/**
 * Result of parsing maze text. Start and goal are present only when the
 * text marks them.
 */
export interface ParsedMaze {
  readonly grid: Grid;
  readonly start?: Position;
  readonly goal?: Position;
}

export interface MazeMarkers {
  readonly start?: Position;
  readonly goal?: Position;
}

const FORMAT_HELP =
  `  Expected layout (2*rows+1 lines of 2*cols+1 characters):\n` +
  `    - '+' at every corner (even line, even column)\n` +
  `    - '-' or ' ' between corners on even lines (wall / opening)\n` +
  `    - '|' or ' ' between cells on odd lines (wall / opening)\n` +
  `    - cell centres: ' ' or '.', 'S' for start, 'G' for goal`;

function fail(problem: string, line: number, column: number, text?: string): never {
  let message = `${problem}\n  At line ${line + 1}, column ${column + 1}`;
  if (text !== undefined) {
    message += `: "${text}"`;
  }
  throw new MazeParseError(`${message}\n${FORMAT_HELP}`, line + 1, column + 1);
}

/**
 * Parse a maze drawn as text.
 *
 * Format:
 *     +-+-+
 *     |S  |
 *     +-+ +
 *     |G  |
 *     +-+-+
 *
 * is a 2x2 grid with a single corridor (0,0) → (0,1) → (1,1) → (1,0),
 * start at (0,0) and goal at (1,0). Leading and
 * trailing blank lines are ignored; spaces inside lines are significant.
 *
 * @throws MazeParseError with line/column diagnostics on malformed input
 */
export function parseMaze(text: string): ParsedMaze {
  const lines = text.split('\n').map(line => line.replace(/\r$/, ''));
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();

  if (lines.length < 3 || lines.length % 2 === 0) {
    fail(`Maze text must have an odd number of lines (at least 3), got ${lines.length}`, 0, 0);
  }
  const width = lines[0].length;
  if (width < 3 || width % 2 === 0) {
    fail(`Maze lines must have an odd width (at least 3), got ${width}`, 0, 0, lines[0]);
  }
  lines.forEach((line, i) => {
    if (line.length !== width) {
      fail(`Inconsistent line width: expected ${width}, got ${line.length}`, i, 0, line);
    }
  });

  const rows = (lines.length - 1) / 2;
  const cols = (width - 1) / 2;
  const grid = createGrid(rows, cols);
  let start: Position | undefined;
  let goal: Position | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    for (let j = 0; j < width; j++) {
      const ch = line[j];

      if (i % 2 === 0 && j % 2 === 0) {
        if (ch !== '+') fail(`Expected '+' at corner, got '${ch}'`, i, j, line);
        continue;
      }

      if (i % 2 === 1 && j % 2 === 1) {
        // Cell centre
        const pos = new Position((i - 1) / 2, (j - 1) / 2);
        if (ch === 'S') {
          if (start) fail(`Duplicate start marker (first at ${start})`, i, j, line);
          start = pos;
        } else if (ch === 'G') {
          if (goal) fail(`Duplicate goal marker (first at ${goal})`, i, j, line);
          goal = pos;
        } else if (ch !== ' ' && ch !== '.') {
          fail(`Invalid cell marker '${ch}'`, i, j, line);
        }
        continue;
      }

      const horizontal = i % 2 === 0;
      const wallChar = horizontal ? '-' : '|';
      if (ch === wallChar) continue;
      if (ch !== ' ') {
        fail(`Expected '${wallChar}' or ' ' for a ${horizontal ? 'horizontal' : 'vertical'} wall, got '${ch}'`, i, j, line);
      }

      if (horizontal) {
        openHorizontal(grid, i / 2, (j - 1) / 2);
      } else {
        openVertical(grid, (i - 1) / 2, j / 2);
      }
    }
  }

  return { grid: freezeGrid(grid), start, goal };
}

// Opening on the horizontal line above row `line` (line == rows is the bottom edge)
function openHorizontal(grid: MutableGrid, line: number, col: number): void {
  if (line === 0) {
    grid.cells[0][col].walls.top = false;
  } else if (line === grid.rows) {
    grid.cells[grid.rows - 1][col].walls.bottom = false;
  } else {
    removeWall(grid, new Position(line - 1, col), new Position(line, col));
  }
}

// Opening on the vertical line left of column `line` (line == cols is the right edge)
function openVertical(grid: MutableGrid, row: number, line: number): void {
  if (line === 0) {
    grid.cells[row][0].walls.left = false;
  } else if (line === grid.cols) {
    grid.cells[row][grid.cols - 1].walls.right = false;
  } else {
    removeWall(grid, new Position(row, line - 1), new Position(row, line));
  }
}

/**
 * Export a grid to the text layout (inverse of parseMaze).
 *
 * @example
 * const { grid } = parseMaze('+-+-+\n|   |\n+-+-+');
 * exportMaze(grid) // '+-+-+\n|   |\n+-+-+'
 */
export function exportMaze(grid: Grid, markers: MazeMarkers = {}): string {
  const out: string[] = [];

  for (let r = 0; r <= grid.rows; r++) {
    let border = '+';
    for (let c = 0; c < grid.cols; c++) {
      const walled = r < grid.rows ? grid.cells[r][c].walls.top : grid.cells[grid.rows - 1][c].walls.bottom;
      border += (walled ? '-' : ' ') + '+';
    }
    out.push(border);

    if (r === grid.rows) break;

    let body = grid.cells[r][0].walls.left ? '|' : ' ';
    for (let c = 0; c < grid.cols; c++) {
      const pos = new Position(r, c);
      const marker = markers.start?.equals(pos) ? 'S' : markers.goal?.equals(pos) ? 'G' : ' ';
      body += marker + (grid.cells[r][c].walls.right ? '|' : ' ');
    }
    out.push(body);
  }

  return out.join('\n');
}
