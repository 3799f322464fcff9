/**
 * Game settings, read from a JSON5 file.
 *
 * Example `mazewalk.config.json5`:
 *
 *     {
 *       trail: { enabled: true },
 *       placement: { goalStrategy: 'random', maxAttempts: 12 },
 *       generation: { maxAttempts: 3 },
 *       logLevel: 'info',
 *     }
 *
 * Every field is optional; missing ones take the value from
 * DEFAULT_SETTINGS. Difficulty presets are fixed and not configurable here.
 */

import { readFileSync } from 'node:fs';
import JSON5 from 'json5';
import { MazeConfigError } from '../core/errors.js';
import { type GoalStrategy, type PlacementOptions, DEFAULT_PLACEMENT_OPTIONS } from '../maze/placement.js';
import { type LogLevel, LOG_LEVELS } from '../utils/logger.js';

export interface GameSettings {
  readonly trail: { readonly enabled: boolean };
  readonly placement: PlacementOptions;
  readonly generation: { readonly maxAttempts: number };
  readonly logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: GameSettings = Object.freeze({
  trail: Object.freeze({ enabled: true }),
  placement: DEFAULT_PLACEMENT_OPTIONS,
  generation: Object.freeze({ maxAttempts: 3 }),
  logLevel: 'warn',
});

const GOAL_STRATEGIES: ReadonlyArray<GoalStrategy> = ['farthest', 'random'];

type RawObject = { readonly [key: string]: unknown };

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects problems so one error can report all of them.
 */
class SettingsReader {
  readonly problems: string[] = [];

  section(raw: RawObject, key: string, allowed: ReadonlyArray<string>): RawObject {
    const value = raw[key];
    if (value === undefined) {
      return {};
    }
    if (!isObject(value)) {
      this.problems.push(`'${key}' must be an object`);
      return {};
    }
    this.checkKeys(value, allowed, `${key}.`);
    return value;
  }

  checkKeys(raw: RawObject, allowed: ReadonlyArray<string>, prefix = ''): void {
    for (const key of Object.keys(raw)) {
      if (!allowed.includes(key)) {
        this.problems.push(`Unknown setting '${prefix}${key}' (expected one of: ${allowed.join(', ')})`);
      }
    }
  }

  boolean(raw: RawObject, key: string, path: string, fallback: boolean): boolean {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.problems.push(`'${path}' must be true or false, got ${JSON.stringify(value)}`);
      return fallback;
    }
    return value;
  }

  positiveInt(raw: RawObject, key: string, path: string, fallback: number): number {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      this.problems.push(`'${path}' must be a positive integer, got ${JSON.stringify(value)}`);
      return fallback;
    }
    return value;
  }

  choice<T extends string>(
    raw: RawObject,
    key: string,
    path: string,
    options: ReadonlyArray<T>,
    fallback: T
  ): T {
    const value = raw[key];
    if (value === undefined) return fallback;
    const match = options.find(option => option === value);
    if (match === undefined) {
      this.problems.push(`'${path}' must be one of: ${options.join(', ')}, got ${JSON.stringify(value)}`);
      return fallback;
    }
    return match;
  }
}

/**
 * Validate an already-parsed settings value and merge it over the defaults.
 *
 * @throws MazeConfigError listing every invalid or unknown field
 */
export function resolveSettings(raw: unknown, source = 'settings'): GameSettings {
  if (!isObject(raw)) {
    throw new MazeConfigError(`Invalid ${source}: top level must be an object`);
  }

  const reader = new SettingsReader();
  reader.checkKeys(raw, ['trail', 'placement', 'generation', 'logLevel']);

  const trail = reader.section(raw, 'trail', ['enabled']);
  const placement = reader.section(raw, 'placement', ['goalStrategy', 'maxAttempts']);
  const generation = reader.section(raw, 'generation', ['maxAttempts']);

  const settings: GameSettings = {
    trail: {
      enabled: reader.boolean(trail, 'enabled', 'trail.enabled', DEFAULT_SETTINGS.trail.enabled),
    },
    placement: {
      goalStrategy: reader.choice(
        placement,
        'goalStrategy',
        'placement.goalStrategy',
        GOAL_STRATEGIES,
        DEFAULT_SETTINGS.placement.goalStrategy
      ),
      maxAttempts: reader.positiveInt(
        placement,
        'maxAttempts',
        'placement.maxAttempts',
        DEFAULT_SETTINGS.placement.maxAttempts
      ),
    },
    generation: {
      maxAttempts: reader.positiveInt(
        generation,
        'maxAttempts',
        'generation.maxAttempts',
        DEFAULT_SETTINGS.generation.maxAttempts
      ),
    },
    logLevel: reader.choice(raw, 'logLevel', 'logLevel', LOG_LEVELS, DEFAULT_SETTINGS.logLevel),
  };

  if (reader.problems.length > 0) {
    throw new MazeConfigError(
      `Invalid ${source}:\n` + reader.problems.map(problem => `  - ${problem}`).join('\n')
    );
  }
  return settings;
}

/**
 * Parse JSON5 settings text.
 *
 * @param source - Name used in error messages, e.g. the file path
 * @throws MazeConfigError on syntax errors or invalid fields
 */
export function parseSettings(text: string, source = 'settings'): GameSettings {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MazeConfigError(`Could not parse ${source}: ${reason}`);
  }
  return resolveSettings(raw, source);
}

/**
 * Read and parse a JSON5 settings file.
 */
export function loadSettings(path: string): GameSettings {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MazeConfigError(`Could not read settings file '${path}': ${reason}`);
  }
  return parseSettings(text, path);
}
