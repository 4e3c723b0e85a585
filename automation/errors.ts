/**
 * Error kinds raised by the tracker.
 *
 * `fatal` decides the scheduler's disposition: fatal errors end the loop
 * (ERROR → CLOSED), everything else is answered with a backoff retry.
 */

export class StandingsError extends Error {
  readonly fatal: boolean;

  constructor(message: string, fatal: boolean) {
    super(message);
    this.name = new.target.name;
    this.fatal = fatal;
  }
}

/** Missing or unusable configuration (target file, numeric settings). */
export class ConfigError extends StandingsError {
  constructor(message: string) {
    super(message, true);
  }
}

/** The virtualized list kept growing past the iteration bound. */
export class StabilizationTimeout extends StandingsError {
  readonly iterations: number;
  readonly rowsSeen: number;

  constructor(iterations: number, rowsSeen: number) {
    super(
      `Standings did not stabilize after ${iterations} iterations (${rowsSeen} rows seen)`,
      false
    );
    this.iterations = iterations;
    this.rowsSeen = rowsSeen;
  }
}

/** The browser, context or page is gone and cannot be reused. */
export class SessionFatal extends StandingsError {
  constructor(message: string) {
    super(message, true);
  }
}

/** Malformed numeric input handed to the projection engine. */
export class ProjectionError extends StandingsError {
  constructor(message: string) {
    super(message, false);
  }
}

/** A stop was requested while a poll was in progress. */
export class PollCancelled extends StandingsError {
  constructor() {
    super('Poll cancelled', false);
  }
}

export function isFatal(err: unknown): boolean {
  return err instanceof StandingsError && err.fatal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
