/**
 * Incremental collector: rebuilds the full leaderboard from a virtualized
 * view that only mounts the rows currently on screen.
 *
 * Row identity comes from the extractor (accessible label), never from DOM
 * position: recycled row elements change content as the list scrolls.
 */

import { StabilizationTimeout } from '../errors';
import { MAX_SCROLL_ATTEMPTS, SCROLL_SETTLE_MS, CANCEL_TICK_MS } from '../selectors';
import { readMountedRows } from './extractor';
import { Logger, StandingsRow, settle } from './helpers';

/** The slice of a live page the collector needs. */
export interface StandingsView {
  /** Markup of the currently mounted rows (or the whole page). */
  readMountedMarkup(): Promise<string>;
  /** `rowSelector` is the one the extractor matched on the last read. */
  scrollLastRowIntoView(rowSelector: string): Promise<void>;
}

export interface CollectOptions {
  settleMs?: number;
  maxIterations?: number;
  tickMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export async function collectStandings(
  view: StandingsView,
  options: CollectOptions = {}
): Promise<StandingsRow[]> {
  const settleMs = options.settleMs ?? SCROLL_SETTLE_MS;
  const maxIterations = options.maxIterations ?? MAX_SCROLL_ATTEMPTS;
  const tickMs = options.tickMs ?? CANCEL_TICK_MS;
  const logger = options.logger ?? console;

  const seen = new Set<string>();
  const result: StandingsRow[] = [];
  let previousSize = -1;
  let anonymous = 0;
  let iterations = 0;

  while (true) {
    if (iterations >= maxIterations) {
      throw new StabilizationTimeout(iterations, result.length);
    }
    iterations++;

    const { rows: mounted, rowSelector } = readMountedRows(await view.readMountedMarkup());
    for (const { identity, row } of mounted) {
      if (identity === null) {
        anonymous++;
        continue;
      }
      if (seen.has(identity)) continue;
      seen.add(identity);
      result.push(row);
    }

    // Nothing mounted means nothing to scroll towards
    if (mounted.length === 0 || rowSelector === null || result.length === previousSize) break;
    previousSize = result.length;

    await view.scrollLastRowIntoView(rowSelector);
    await settle(settleMs, options.signal, tickMs);
  }

  if (anonymous > 0) {
    logger.warn(`  [collector] skipped ${anonymous} mounted rows without an identity`);
  }
  logger.log(`  [collector] ${result.length} rows after ${iterations} reads`);

  return result;
}
