/**
 * Stopwatch for a program's run step. Started right before the timed
 * process spawns and read once it closes; compilation is never inside it.
 */
export class Timer {
  private start = performance.now();

  /** Milliseconds since construction, fractional */
  elapsedMs(): number {
    return performance.now() - this.start;
  }

  /** Short form for verbose logs: "150ms" below a second, "1.2s" above */
  elapsed(): string {
    const ms = this.elapsedMs();
    if (ms >= 1000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    return `${Math.round(ms)}ms`;
  }
}

/** Format a duration in seconds with millisecond precision, e.g. "0.042s" */
export function formatSeconds(ms: number): string {
  return `${(Math.max(ms, 0) / 1000).toFixed(3)}s`;
}
