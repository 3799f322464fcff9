/**
 * mazewalk - maze generation, start/goal placement and move validation.
 *
 * Pipeline:
 * 1. Generate: carve a perfect maze, then open extra walls per difficulty
 * 2. Place: BFS from a random start, goal at or beyond the minimum distance
 * 3. Play: validate each move against the frozen grid
 */

export { Direction, DIRECTIONS, flipDirection, isDirection, parseDirection } from './core/direction.js';
export { Position } from './core/position.js';
export { MazeError, MazeConfigError, MazeGenerationError } from './core/errors.js';
export {
  createGrid,
  freezeGrid,
  isInBounds,
  getCell,
  wallsAt,
  dimensions,
  hasWall,
  neighborsOf,
  openNeighborsOf,
  countPassages,
  removeWall,
  WALL_FACING,
} from './core/types.js';
export type { Cell, Grid, MutableCell, MutableGrid, Neighbor, Walls, WallSide } from './core/types.js';

export { Difficulty, DIFFICULTIES, DIFFICULTY_PRESETS, getPreset, isDifficulty } from './maze/difficulty.js';
export type { DifficultyPreset } from './maze/difficulty.js';
export { SeededRandom, createRandom } from './maze/random.js';
export type { RandomSource } from './maze/random.js';
export { carvePerfectMaze, adjustComplexity, generateGrid } from './maze/generator.js';
export type { GeneratedGrid, GridShape } from './maze/generator.js';
export { DistanceMap, bfsDistances, shortestPath } from './maze/distance.js';
export {
  placeStartAndGoal,
  requiredDistance,
  isPlacementFailure,
  DEFAULT_PLACEMENT_OPTIONS,
} from './maze/placement.js';
export type { GoalStrategy, Placement, PlacementFailure, PlacementOptions } from './maze/placement.js';
export { generateMaze, generateFromPreset } from './maze/maze.js';
export type { GenerateOptions, Maze, MazeStats } from './maze/maze.js';

export { isValidMove, tryMove } from './moves/validator.js';
export { isMoveFailure } from './moves/failure.js';
export type { MoveFailure, MoveFailureReason } from './moves/failure.js';

export { GameSession } from './session/session.js';
export type { MoveResult, SessionOptions, SessionStatus } from './session/session.js';
export { updateTrail } from './session/trail.js';
export { Stopwatch, formatTime } from './session/timer.js';
export type { Clock } from './session/timer.js';

export { DEFAULT_SETTINGS, parseSettings, resolveSettings, loadSettings } from './config/settings.js';
export type { GameSettings } from './config/settings.js';
export { createLogger, isLogLevel } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
