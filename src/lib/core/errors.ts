/**
 * Error types raised by the maze engine.
 *
 * Expected negative outcomes (a rejected move, an exhausted placement
 * attempt) are returned as failure values instead; see
 * `moves/failure.ts` and `maze/placement.ts`.
 */

export class MazeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration: bad dimensions, unknown difficulty, malformed
 * settings. Fatal to the call that received it.
 */
export class MazeConfigError extends MazeError {}

/**
 * Placement could not satisfy the minimum-distance constraint even after
 * regenerating the maze. Indicates a preset that cannot work for its grid.
 */
export class MazeGenerationError extends MazeError {
  constructor(
    message: string,
    public readonly attempts: number
  ) {
    super(message);
  }
}

/**
 * Malformed maze text.
 */
export class MazeParseError extends MazeError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(message);
  }
}
