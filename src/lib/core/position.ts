import { Direction, DIRECTION_DELTAS } from './direction.js';

/**
 * A (row, col) position within a maze grid.
 */
export class Position {
  constructor(
    public readonly row: number,
    public readonly col: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.row},${this.col}`;
  }

  /**
   * Check equality with another position.
   */
  equals(other: Position): boolean {
    return this.row === other.row && this.col === other.col;
  }

  /**
   * The position one step away in the given direction. No bounds check.
   */
  step(direction: Direction): Position {
    const [dr, dc] = DIRECTION_DELTAS[direction];
    return new Position(this.row + dr, this.col + dc);
  }

  clone(): Position {
    return new Position(this.row, this.col);
  }

  toString(): string {
    return `Position(${this.row}, ${this.col})`;
  }
}
