/**
 * Simple performance timer for measuring operation durations
 */
export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Stop the timer and return total elapsed time
   */
  stop(): number {
    this.endTime = performance.now();
    return this.elapsed;
  }

  /**
   * Get elapsed time in milliseconds
   */
  get elapsed(): number {
    const end = this.endTime ?? performance.now();
    return end - this.startTime;
  }

  get formatted(): string {
    return formatDuration(this.elapsed);
  }
}

export interface TimedComputation<T> {
  result: T;
  elapsedMs: number;
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${ms.toFixed(3)}ms`;
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Run `fn` synchronously and report how long it took.
 * Anything `fn` throws propagates unchanged.
 */
export function timed<T>(fn: () => T): TimedComputation<T> {
  const timer = new Timer();
  const result = fn();
  return { result, elapsedMs: timer.stop() };
}

/**
 * Measure the execution time of an async function
 */
export async function measure<T>(fn: () => Promise<T>): Promise<TimedComputation<T>> {
  const timer = new Timer();
  const result = await fn();
  return { result, elapsedMs: timer.stop() };
}

/**
 * Create a simple stopwatch
 */
export function stopwatch(): { elapsed: () => number; formatted: () => string } {
  const start = performance.now();
  return {
    elapsed: () => performance.now() - start,
    formatted: () => formatDuration(performance.now() - start),
  };
}
