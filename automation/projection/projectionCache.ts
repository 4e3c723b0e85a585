/**
 * Memoized projections for the read API.
 *
 * A stored snapshot never changes, so its report is computed once per
 * process. Keys combine the time index with a digest of the entries: two
 * polls in the same minute share a time index but not their rows.
 */

import { createHash } from 'crypto';
import { StandingsSnapshot } from '../scrape/helpers';
import { ProjectionParams, ProjectionReport, projectSnapshotAsync } from './winProbability';

export type Projector = (snapshot: StandingsSnapshot, params: ProjectionParams) => Promise<ProjectionReport>;

export const DEFAULT_CACHE_ENTRIES = 2_000;

export function snapshotKey(snapshot: StandingsSnapshot): string {
  const digest = createHash('sha1').update(JSON.stringify(snapshot.entries)).digest('hex');
  return `${snapshot.timeIndex}:${digest}`;
}

export class ProjectionCache {
  private reports = new Map<string, Promise<ProjectionReport>>();
  private params: ProjectionParams;
  private projector: Projector;
  private maxEntries: number;

  constructor(
    params: ProjectionParams,
    opts: { projector?: Projector; maxEntries?: number } = {}
  ) {
    this.params = params;
    this.projector = opts.projector ?? projectSnapshotAsync;
    this.maxEntries = opts.maxEntries ?? DEFAULT_CACHE_ENTRIES;
  }

  get size(): number {
    return this.reports.size;
  }

  /** Concurrent callers for the same snapshot share one simulation. */
  async project(snapshot: StandingsSnapshot): Promise<ProjectionReport> {
    const key = snapshotKey(snapshot);
    const cached = this.reports.get(key);
    if (cached) return cached;

    const pending = this.projector(snapshot, this.params);
    this.remember(key, pending);
    try {
      return await pending;
    } catch (err: unknown) {
      this.reports.delete(key);
      throw err;
    }
  }

  /** One report per snapshot, in series order, simulated one at a time. */
  async history(series: readonly StandingsSnapshot[]): Promise<ProjectionReport[]> {
    const reports: ProjectionReport[] = [];
    for (const snapshot of series) {
      reports.push(await this.project(snapshot));
    }
    return reports;
  }

  private remember(key: string, report: Promise<ProjectionReport>): void {
    this.reports.set(key, report);
    // Map iteration is insertion order: the first key is the oldest
    while (this.reports.size > this.maxEntries) {
      const oldest = this.reports.keys().next();
      if (oldest.done) break;
      this.reports.delete(oldest.value);
    }
  }
}
