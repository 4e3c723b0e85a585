/**
 * Historical aggregation: a directory of per-poll CSVs → ordered series.
 *
 * A file's timeIndex comes from its name:
 *   standings_20261018_101500.csv → minutes since epoch of that UTC time
 *   example_standings_29341234.csv → 29341234
 * Files whose name yields neither are ignored.
 */

import fs from 'fs';
import path from 'path';
import { StandingsSnapshot, buildSnapshot, csvToRows } from './scrape/helpers';

const STAMPED_NAME = /_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.csv$/i;
const INDEXED_NAME = /_(\d+)\.csv$/i;

export interface FileTime {
  timeIndex: number;
  capturedAt: Date;
}

export function timeFromFileName(fileName: string): FileTime | null {
  const stamped = STAMPED_NAME.exec(fileName);
  if (stamped) {
    const [, y, mo, d, h, mi, s] = stamped.map(Number);
    const capturedAt = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
    if (Number.isNaN(capturedAt.getTime())) return null;
    return { timeIndex: Math.floor(capturedAt.getTime() / 60_000), capturedAt };
  }

  const indexed = INDEXED_NAME.exec(fileName);
  if (indexed) {
    const timeIndex = Number(indexed[1]);
    if (!Number.isSafeInteger(timeIndex)) return null;
    return { timeIndex, capturedAt: new Date(timeIndex * 60_000) };
  }

  return null;
}

/** Every snapshot in `dir`, sorted by timeIndex; later files win ties. */
export function loadStandingsHistory(dir: string): StandingsSnapshot[] {
  if (!fs.existsSync(dir)) return [];

  const byIndex = new Map<number, StandingsSnapshot>();
  const files = fs.readdirSync(dir).filter(f => f.toLowerCase().endsWith('.csv')).sort();

  for (const file of files) {
    const time = timeFromFileName(file);
    if (!time) continue;

    const rows = csvToRows(fs.readFileSync(path.join(dir, file), 'utf-8'));
    if (rows.length === 0) continue;

    byIndex.set(time.timeIndex, buildSnapshot(rows, time.capturedAt, time.timeIndex));
  }

  return [...byIndex.values()].sort((a, b) => a.timeIndex - b.timeIndex);
}

export function latestSnapshot(dir: string): StandingsSnapshot | null {
  const history = loadStandingsHistory(dir);
  return history.length > 0 ? history[history.length - 1] : null;
}
