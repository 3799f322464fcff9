/**
 * Headless play session: one player walking one maze at a time.
 *
 * The session owns the only state that changes after generation (player
 * position, trail, move count, timer). Renderers and input layers read it
 * and call `move`; they never touch the grid.
 */

import type { Position } from '../core/position.js';
import { type GameSettings, DEFAULT_SETTINGS } from '../config/settings.js';
import type { Difficulty } from '../maze/difficulty.js';
import { type Maze, generateMaze } from '../maze/maze.js';
import { type RandomSource, createRandom, randomInt } from '../maze/random.js';
import { type MoveFailure, isMoveFailure } from '../moves/failure.js';
import { tryMove } from '../moves/validator.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { type Clock, Stopwatch, formatTime } from './timer.js';
import { updateTrail } from './trail.js';

export type SessionStatus = 'playing' | 'won';

/**
 * A move that was carried out.
 */
export interface MoveResult {
  readonly moved: true;
  readonly position: Position;
  /** True when this move reached the goal. */
  readonly won: boolean;
}

export interface SessionOptions {
  /** Seeds every maze this session generates. */
  readonly random?: RandomSource;
  readonly seed?: number;
  readonly settings?: GameSettings;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export class GameSession {
  private currentMaze: Maze;
  private current: Position;
  private path: Position[];
  private state: SessionStatus = 'playing';
  private moves = 0;
  private showTrail: boolean;

  private readonly seeds: RandomSource;
  private readonly settings: GameSettings;
  private readonly logger: Logger;
  private readonly stopwatch: Stopwatch;

  constructor(
    public readonly difficulty: Difficulty | string,
    options: SessionOptions = {}
  ) {
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.logger = options.logger ?? createLogger(this.settings.logLevel);
    this.seeds = options.random ?? createRandom(options.seed);
    this.stopwatch = new Stopwatch(options.clock);
    this.showTrail = this.settings.trail.enabled;

    this.currentMaze = this.newMaze();
    this.current = this.currentMaze.start;
    this.path = [this.current];
    this.stopwatch.start();
  }

  /**
   * Generate a maze for `difficulty` and place the player on its start.
   */
  static start(difficulty: Difficulty | string, options: SessionOptions = {}): GameSession {
    return new GameSession(difficulty, options);
  }

  get maze(): Maze {
    return this.currentMaze;
  }

  get position(): Position {
    return this.current;
  }

  get status(): SessionStatus {
    return this.state;
  }

  get moveCount(): number {
    return this.moves;
  }

  /**
   * Breadcrumbs from the start to the player, backtracks removed.
   * Recorded whether or not the trail is visible.
   */
  get trail(): ReadonlyArray<Position> {
    return this.path;
  }

  get trailVisible(): boolean {
    return this.showTrail;
  }

  toggleTrail(): boolean {
    this.showTrail = !this.showTrail;
    return this.showTrail;
  }

  /**
   * Move the player one cell. Rejected moves leave the session unchanged.
   */
  move(direction: string): MoveResult | MoveFailure {
    if (this.state === 'won') {
      return { reason: 'GAME_OVER', position: this.current, direction };
    }

    const result = tryMove(this.currentMaze.grid, this.current, direction);
    if (isMoveFailure(result)) {
      return result;
    }

    this.current = result;
    this.moves++;
    updateTrail(this.path, result);

    const won = result.equals(this.currentMaze.goal);
    if (won) {
      this.state = 'won';
      this.stopwatch.stop();
      this.logger.info(
        `Goal reached in ${this.moves} moves (shortest ${this.currentMaze.distance}), ` +
        `time ${this.formattedTime()}`
      );
    }
    return { moved: true, position: result, won };
  }

  /**
   * Discard the current maze and start over on a freshly generated one of
   * the same difficulty.
   */
  restart(): void {
    this.currentMaze = this.newMaze();
    this.current = this.currentMaze.start;
    this.path = [this.current];
    this.moves = 0;
    this.state = 'playing';
    this.stopwatch.reset();
    this.stopwatch.start();
  }

  elapsedSeconds(): number {
    return this.stopwatch.elapsedSeconds();
  }

  formattedTime(): string {
    return formatTime(this.elapsedSeconds());
  }

  private newMaze(): Maze {
    // Each maze gets its own source so generations never share state
    return generateMaze(this.difficulty, {
      random: createRandom(randomInt(this.seeds, 4294967296)),
      settings: this.settings,
      logger: this.logger,
    });
  }
}
