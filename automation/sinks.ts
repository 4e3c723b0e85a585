/**
 * Snapshot sinks: where the scheduler hands each stabilized snapshot.
 */

import fs from 'fs';
import path from 'path';
import { Logger, StandingsSnapshot, snapshotToCsv } from './scrape/helpers';

export interface SnapshotSink {
  readonly name: string;
  write(snapshot: StandingsSnapshot): Promise<void>;
}

/** `standings_YYYYMMDD_HHMMSS.csv` from the UTC capture time. */
export function snapshotFileName(capturedAt: string): string {
  const d = new Date(capturedAt);
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `standings_${date}_${time}.csv`;
}

export class CsvSnapshotSink implements SnapshotSink {
  readonly name = 'csv';
  private dir: string;
  private logger: Logger;

  constructor(dir: string, logger: Logger = console) {
    this.dir = dir;
    this.logger = logger;
  }

  async write(snapshot: StandingsSnapshot): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const filePath = path.join(this.dir, snapshotFileName(snapshot.capturedAt));
    await fs.promises.writeFile(filePath, snapshotToCsv(snapshot), 'utf-8');
    this.logger.log(`  [csv] ${snapshot.entries.length} entries -> ${filePath}`);
  }
}
