/**
 * Cardinal directions for moving between maze cells.
 */
export enum Direction {
  Up = 'up',       // decreasing row
  Right = 'right', // increasing col
  Down = 'down',   // increasing row
  Left = 'left',   // decreasing col
}

/**
 * All directions in clockwise order, starting from Up.
 */
export const DIRECTIONS: ReadonlyArray<Direction> = Object.freeze([
  Direction.Up,
  Direction.Right,
  Direction.Down,
  Direction.Left,
]);

/**
 * Row/column offsets for each direction.
 */
export const DIRECTION_DELTAS: Readonly<Record<Direction, readonly [number, number]>> = Object.freeze({
  [Direction.Up]: [-1, 0],
  [Direction.Right]: [0, 1],
  [Direction.Down]: [1, 0],
  [Direction.Left]: [0, -1],
});

/**
 * Get the opposite direction.
 */
export function flipDirection(dir: Direction): Direction {
  switch (dir) {
    case Direction.Up:
      return Direction.Down;
    case Direction.Down:
      return Direction.Up;
    case Direction.Right:
      return Direction.Left;
    case Direction.Left:
      return Direction.Right;
  }
}

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some(dir => dir === value);
}

const DIRECTION_ALIASES: Readonly<Record<string, Direction>> = Object.freeze({
  up: Direction.Up,
  w: Direction.Up,
  arrowup: Direction.Up,
  right: Direction.Right,
  d: Direction.Right,
  arrowright: Direction.Right,
  down: Direction.Down,
  s: Direction.Down,
  arrowdown: Direction.Down,
  left: Direction.Left,
  a: Direction.Left,
  arrowleft: Direction.Left,
});

/**
 * Map an input token (direction name, WASD key or arrow key name) to a
 * Direction. Matching is case-insensitive.
 *
 * @example
 * parseDirection('ArrowUp') // Direction.Up
 * parseDirection('D')       // Direction.Right
 * parseDirection('jump')    // undefined
 */
export function parseDirection(text: string): Direction | undefined {
  const key = text.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(DIRECTION_ALIASES, key)
    ? DIRECTION_ALIASES[key]
    : undefined;
}
