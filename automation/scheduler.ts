/**
 * PollScheduler: the single supervised poll loop.
 *
 *   UNINITIALIZED → AUTHENTICATING → READY → POLLING ⇄ REFRESHING → CLOSED
 *   any active state → ERROR → RETRY_BACKOFF → POLLING   (transient)
 *                            → CLOSED                    (fatal)
 *
 * One instance owns one StandingsSource. Consumers talk to it through
 * start / stop / status / latestSnapshot only; nothing else reaches the
 * session. Every sleep wakes each `tickMs` to honour stop(); a browser
 * operation already in flight is left to finish.
 */

import { SchedulerTimings } from './config';
import { PollCancelled, errorMessage, isFatal } from './errors';
import { SnapshotSink } from './sinks';
import { StandingsSource } from './session';
import {
  Logger,
  StandingsSnapshot,
  buildSnapshot,
  sleepCancellable,
  toTimeIndex,
} from './scrape/helpers';

export type SchedulerState =
  | 'UNINITIALIZED'
  | 'AUTHENTICATING'
  | 'READY'
  | 'POLLING'
  | 'REFRESHING'
  | 'ERROR'
  | 'RETRY_BACKOFF'
  | 'CLOSED';

export interface SchedulerStatus {
  state: SchedulerState;
  pollCount: number;
  consecutiveFailures: number;
  lastSuccessAt: string | null;
  lastError: string | null;
  latestTimeIndex: number | null;
  latestEntryCount: number | null;
  stopRequested: boolean;
}

export interface SchedulerDeps {
  sinks?: SnapshotSink[];
  logger?: Logger;
  now?: () => Date;
  onTransition?: (from: SchedulerState, to: SchedulerState) => void;
}

export class PollScheduler {
  private source: StandingsSource;
  private timings: SchedulerTimings;
  private sinks: SnapshotSink[];
  private logger: Logger;
  private now: () => Date;
  private onTransition?: (from: SchedulerState, to: SchedulerState) => void;

  private abort = new AbortController();
  private running: Promise<void> | null = null;
  private latest: StandingsSnapshot | null = null;
  private current: SchedulerStatus = {
    state: 'UNINITIALIZED',
    pollCount: 0,
    consecutiveFailures: 0,
    lastSuccessAt: null,
    lastError: null,
    latestTimeIndex: null,
    latestEntryCount: null,
    stopRequested: false,
  };

  constructor(source: StandingsSource, timings: SchedulerTimings, deps: SchedulerDeps = {}) {
    this.source = source;
    this.timings = timings;
    this.sinks = deps.sinks ?? [];
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? (() => new Date());
    this.onTransition = deps.onTransition;
  }

  /** Run until stopped or a fatal error; repeated calls share the same run. */
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  /** Request a cooperative stop; the loop exits within one tick of a sleep. */
  stop(): void {
    if (this.current.stopRequested) return;
    this.current.stopRequested = true;
    this.log('Stop requested');
    this.abort.abort();
  }

  status(): SchedulerStatus {
    return { ...this.current };
  }

  latestSnapshot(): StandingsSnapshot | null {
    return this.latest;
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  private async run(): Promise<void> {
    const signal = this.abort.signal;

    try {
      if (signal.aborted) return;
      this.transition('AUTHENTICATING');
      try {
        await this.source.open(signal);
      } catch (err: unknown) {
        if (err instanceof PollCancelled || signal.aborted) {
          this.log('Stopped during initialization');
          return;
        }
        this.fail(err);
        this.log(`Initialization failed: ${errorMessage(err)}`, 'error');
        return;
      }
      this.transition('READY');
      this.log('Session ready. Starting periodic polling...');

      while (!signal.aborted) {
        this.transition('POLLING');
        const polled = await this.attempt(() => this.pollOnce(signal));
        if (polled === 'fatal' || signal.aborted) break;
        if (polled === 'failed') {
          if (!(await this.backoff(signal))) break;
          continue;
        }

        this.log(`Waiting ${this.timings.pollIntervalMs / 1000}s until next refresh...`);
        if (!(await sleepCancellable(this.timings.pollIntervalMs, signal, this.timings.tickMs))) break;

        this.transition('REFRESHING');
        const refreshed = await this.attempt(() => this.source.reload());
        if (refreshed === 'fatal' || signal.aborted) break;
        if (refreshed === 'failed') {
          if (!(await this.backoff(signal))) break;
          continue;
        }
        if (!(await sleepCancellable(this.timings.refreshSettleMs, signal, this.timings.tickMs))) break;
      }
    } finally {
      await this.shutdown();
    }
  }

  private async pollOnce(signal: AbortSignal): Promise<void> {
    this.log('Starting scheduled scrape...');
    const rows = await this.source.collect(signal);

    const capturedAt = this.now();
    const timeIndex = Math.max(toTimeIndex(capturedAt), this.latest?.timeIndex ?? -Infinity);
    const snapshot = buildSnapshot(rows, capturedAt, timeIndex);

    for (const sink of this.sinks) {
      await sink.write(snapshot);
    }

    this.latest = snapshot;
    this.current.pollCount++;
    this.current.consecutiveFailures = 0;
    this.current.lastSuccessAt = snapshot.capturedAt;
    this.current.lastError = null;
    this.current.latestTimeIndex = snapshot.timeIndex;
    this.current.latestEntryCount = snapshot.entries.length;
    this.log(`Scrape completed: ${snapshot.entries.length} entries at time index ${snapshot.timeIndex}`);
  }

  /** Run one browser-facing step, classifying its failure. */
  private async attempt(op: () => Promise<void>): Promise<'ok' | 'failed' | 'fatal'> {
    try {
      await op();
      return 'ok';
    } catch (err: unknown) {
      if (err instanceof PollCancelled) return 'failed';
      this.fail(err);
      if (isFatal(err)) {
        this.log(`Fatal error, shutting down: ${errorMessage(err)}`, 'error');
        return 'fatal';
      }
      this.current.consecutiveFailures++;
      this.log(
        `Poll failed (${this.current.consecutiveFailures} in a row): ${errorMessage(err)}`,
        'error'
      );
      return 'failed';
    }
  }

  private async backoff(signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    this.transition('RETRY_BACKOFF');
    this.log(`Backing off ${this.timings.backoffMs / 1000}s before retrying...`);
    return sleepCancellable(this.timings.backoffMs, signal, this.timings.tickMs);
  }

  private fail(err: unknown): void {
    this.current.lastError = errorMessage(err);
    this.transition('ERROR');
  }

  private async shutdown(): Promise<void> {
    try {
      await this.source.close();
    } catch (err: unknown) {
      this.log(`Error while closing session: ${errorMessage(err)}`, 'error');
    }
    this.transition('CLOSED');
    this.log('Scheduler shutdown complete');
  }

  private transition(to: SchedulerState): void {
    const from = this.current.state;
    if (from === to) return;
    this.current.state = to;
    this.onTransition?.(from, to);
  }

  private log(message: string, level: 'log' | 'error' = 'log'): void {
    this.logger[level](`${new Date().toISOString()} [scheduler] ${message}`);
  }
}
