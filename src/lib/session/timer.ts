/**
 * Elapsed-time tracking for a play session.
 */

/**
 * Returns the current time in milliseconds.
 */
export type Clock = () => number;

const systemClock: Clock = () => Date.now();

/**
 * Format seconds as `MM:SS.t`. Tenths are truncated, not rounded, and
 * minutes keep counting past 59. Negative input reads as zero.
 *
 * @example
 * formatTime(61.5)  // "01:01.5"
 * formatTime(0.99)  // "00:00.9"
 * formatTime(3600)  // "60:00.0"
 */
export function formatTime(seconds: number): string {
  // The epsilon absorbs float error such as 3599.9 * 10 = 35998.999...
  const tenths = Math.floor(Math.max(0, seconds) * 10 + 1e-6);
  const minutes = Math.floor(tenths / 600);
  const secs = Math.floor((tenths % 600) / 10);
  return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}.${tenths % 10}`;
}

/**
 * A pausable stopwatch over an injectable clock.
 */
export class Stopwatch {
  private startedAt: number | null = null;
  private accumulated = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  get running(): boolean {
    return this.startedAt !== null;
  }

  start(): void {
    if (this.startedAt === null) {
      this.startedAt = this.clock();
    }
  }

  stop(): void {
    if (this.startedAt !== null) {
      this.accumulated += this.clock() - this.startedAt;
      this.startedAt = null;
    }
  }

  reset(): void {
    this.startedAt = null;
    this.accumulated = 0;
  }

  elapsedSeconds(): number {
    const live = this.startedAt === null ? 0 : this.clock() - this.startedAt;
    return (this.accumulated + live) / 1000;
  }
}
