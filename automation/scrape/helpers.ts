/**
 * Scraper helpers: types, parsing, snapshot building, CSV, cancellable sleep.
 *
 * No external deps; CSV is hand-rolled.
 */

import { setTimeout as delay } from 'timers/promises';
import { PollCancelled } from '../errors';
import { UNIT_LABELS } from '../selectors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StandingsRow {
  rank: number | null;
  teamName: string | null;
  /** Player minutes remaining */
  pmr: number | null;
  /** Fantasy points so far */
  fpts: number | null;
}

export interface StandingsSnapshot {
  /** Minutes since the Unix epoch of `capturedAt` */
  timeIndex: number;
  capturedAt: string;
  entries: readonly StandingsRow[];
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const CSV_COLUMNS = ['Rank', 'Team Name', 'PMR', 'FPTS'] as const;

// ---------------------------------------------------------------------------
// Robust number parsing
// ---------------------------------------------------------------------------

const NUMBER_TOKEN = /[-+]?\d*\.?\d+/;

function stripUnits(text: string): string {
  let cleaned = text.trim();
  for (const unit of UNIT_LABELS) {
    const re = new RegExp(`\\s*${unit}\\s*$`, 'i');
    cleaned = cleaned.replace(re, '');
  }
  return cleaned;
}

/** First signed decimal token in a cell like "1,234.5 FPTS" or "−3". */
export function parseDecimal(text: string | null | undefined): number | null {
  if (!text) return null;
  const cleaned = stripUnits(text.replace(/−/g, '-').replace(/,/g, ''));
  const match = NUMBER_TOKEN.exec(cleaned);
  if (!match) return null;
  const n = Number(match[0]);
  return Number.isFinite(n) ? n : null;
}

/** Same token, truncated toward zero ("12th" → 12, "7.9" → 7). */
export function parseInteger(text: string | null | undefined): number | null {
  const n = parseDecimal(text);
  return n === null ? null : Math.trunc(n);
}

// ---------------------------------------------------------------------------
// Snapshot building
// ---------------------------------------------------------------------------

export function toTimeIndex(date: Date): number {
  return Math.floor(date.getTime() / 60_000);
}

export function hasAnyField(row: StandingsRow): boolean {
  return row.rank !== null || row.teamName !== null || row.pmr !== null || row.fpts !== null;
}

/**
 * Freeze collected rows into a snapshot.
 *
 * Team names are unique (first occurrence wins); entries are sorted by rank
 * only when every entry carries one, otherwise insertion order is kept.
 */
export function buildSnapshot(
  rows: readonly StandingsRow[],
  capturedAt: Date,
  timeIndex: number = toTimeIndex(capturedAt)
): StandingsSnapshot {
  const seen = new Set<string>();
  const entries: StandingsRow[] = [];

  for (const row of rows) {
    if (!hasAnyField(row)) continue;
    if (row.teamName !== null) {
      if (seen.has(row.teamName)) continue;
      seen.add(row.teamName);
    }
    entries.push(Object.freeze({ ...row }));
  }

  if (entries.length > 0 && entries.every(e => e.rank !== null)) {
    // Array.prototype.sort is stable
    entries.sort((a, b) => (a.rank ?? 0) - (b.rank ?? 0));
  }

  return Object.freeze({
    timeIndex,
    capturedAt: capturedAt.toISOString(),
    entries: Object.freeze(entries),
  });
}

// ---------------------------------------------------------------------------
// CSV (hand-rolled)
// ---------------------------------------------------------------------------

function csvEscape(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

/** Shortest round-trip digits, written out in full: 1e-7 becomes 0.0000001. */
function formatNumber(n: number | null): string {
  if (n === null) return '';
  const text = String(n);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + '0'.repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function snapshotToCsv(snapshot: StandingsSnapshot): string {
  const lines: string[] = [CSV_COLUMNS.join(',')];

  for (const row of snapshot.entries) {
    lines.push(
      [
        formatNumber(row.rank),
        csvEscape(row.teamName ?? ''),
        formatNumber(row.pmr),
        formatNumber(row.fpts),
      ].join(',')
    );
  }

  return lines.join('\n') + '\n';
}

/** Split CSV text into records, honouring quoted fields. */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter(r => r.some(v => v.trim() !== ''));
}

/** Rows of a CSV written by `snapshotToCsv` (columns located by header). */
export function csvToRows(text: string): StandingsRow[] {
  const [header, ...records] = parseCsv(text);
  if (!header) return [];

  const col = (name: string) => header.findIndex(h => h.trim() === name);
  const rankIdx = col('Rank');
  const teamIdx = col('Team Name');
  const pmrIdx = col('PMR');
  const fptsIdx = col('FPTS');
  const cell = (record: string[], idx: number) => (idx >= 0 ? record[idx] ?? '' : '');

  const rows: StandingsRow[] = [];
  for (const record of records) {
    const team = cell(record, teamIdx).trim();
    const row: StandingsRow = {
      rank: parseInteger(cell(record, rankIdx)),
      teamName: team === '' ? null : team,
      pmr: parseInteger(cell(record, pmrIdx)),
      fpts: parseDecimal(cell(record, fptsIdx)),
    };
    if (hasAnyField(row)) rows.push(row);
  }
  return rows;
}

// ---------------------------------------------------------------------------
// Cancellable sleep
// ---------------------------------------------------------------------------

/**
 * Sleep `totalMs`, waking every `tickMs` to check `signal`.
 *
 * Returns false when cancelled, true when the full interval elapsed.
 */
export async function sleepCancellable(
  totalMs: number,
  signal: AbortSignal | undefined,
  tickMs: number
): Promise<boolean> {
  let remaining = totalMs;
  while (remaining > 0) {
    if (signal?.aborted) return false;
    const step = Math.min(tickMs, remaining);
    await delay(step);
    remaining -= step;
  }
  return !signal?.aborted;
}

/** Like `sleepCancellable`, but a cancellation raises `PollCancelled`. */
export async function settle(
  totalMs: number,
  signal: AbortSignal | undefined,
  tickMs: number
): Promise<void> {
  if (!(await sleepCancellable(totalMs, signal, tickMs))) {
    throw new PollCancelled();
  }
}
