import { test, expect } from '@playwright/test';
import {
  buildSnapshot,
  csvToRows,
  parseCsv,
  parseDecimal,
  parseInteger,
  sleepCancellable,
  snapshotToCsv,
  toTimeIndex,
} from '../automation/scrape/helpers';
import { team } from './support/fakes';

const capturedAt = new Date('2026-10-18T10:15:30.000Z');

test.describe('number parsing', () => {
  test('parseDecimal handles separators, units and signs', () => {
    expect(parseDecimal('1,234.5 FPTS')).toBe(1234.5);
    expect(parseDecimal('95.5FPTS')).toBe(95.5);
    expect(parseDecimal('−3')).toBe(-3);
    expect(parseDecimal('+2.5')).toBe(2.5);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('  42 pts ')).toBe(42);
  });

  test('parseDecimal returns null for blanks and non-numbers', () => {
    expect(parseDecimal(null)).toBeNull();
    expect(parseDecimal(undefined)).toBeNull();
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('--')).toBeNull();
  });

  test('parseInteger truncates toward zero', () => {
    expect(parseInteger('12th')).toBe(12);
    expect(parseInteger('7.9')).toBe(7);
    expect(parseInteger('−7.9')).toBe(-7);
    expect(parseInteger('1,024 PMR')).toBe(1024);
    expect(parseInteger('n/a')).toBeNull();
  });
});

test.describe('buildSnapshot', () => {
  test('keeps the first row for a repeated team name', () => {
    const snapshot = buildSnapshot(
      [team('A', 1, 60, 80), team('B', 2, 90, 70), team('A', 3, 10, 5)],
      capturedAt
    );
    expect(snapshot.entries).toEqual([team('A', 1, 60, 80), team('B', 2, 90, 70)]);
  });

  test('sorts by rank only when every entry has one', () => {
    const ranked = buildSnapshot([team('C', 3, 0, 1), team('A', 1, 0, 3), team('B', 2, 0, 2)], capturedAt);
    expect(ranked.entries.map(e => e.teamName)).toEqual(['A', 'B', 'C']);

    const partial = buildSnapshot([team('C', 3, 0, 1), team('A', null, 0, 3), team('B', 2, 0, 2)], capturedAt);
    expect(partial.entries.map(e => e.teamName)).toEqual(['C', 'A', 'B']);
  });

  test('equal ranks keep their collection order', () => {
    const snapshot = buildSnapshot([team('Y', 2, 0, 1), team('X', 1, 0, 1), team('Z', 2, 0, 1)], capturedAt);
    expect(snapshot.entries.map(e => e.teamName)).toEqual(['X', 'Y', 'Z']);
  });

  test('drops rows with no field and keeps unnamed rows', () => {
    const snapshot = buildSnapshot(
      [
        { rank: null, teamName: null, pmr: null, fpts: null },
        { rank: null, teamName: null, pmr: 30, fpts: 12 },
        { rank: null, teamName: null, pmr: 40, fpts: 9 },
      ],
      capturedAt
    );
    expect(snapshot.entries).toHaveLength(2);
  });

  test('derives the time index from the capture time and freezes the result', () => {
    const snapshot = buildSnapshot([team('A', 1, 60, 80)], capturedAt);

    expect(snapshot.timeIndex).toBe(toTimeIndex(capturedAt));
    expect(snapshot.timeIndex).toBe(Math.floor(Date.parse('2026-10-18T10:15:00Z') / 60_000));
    expect(snapshot.capturedAt).toBe('2026-10-18T10:15:30.000Z');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.entries)).toBe(true);
    expect(Object.isFrozen(snapshot.entries[0])).toBe(true);
  });

  test('an explicit time index overrides the capture minute', () => {
    expect(buildSnapshot([team('A', 1, 60, 80)], capturedAt, 123).timeIndex).toBe(123);
  });
});

test.describe('CSV', () => {
  test('writes the header and one line per entry', () => {
    const snapshot = buildSnapshot(
      [team('GridironGurus', 1, 60, 95.5), team('Smith, Jones & Co', 2, null, 80), team('Say "hi"', 3, 0, 0)],
      capturedAt
    );

    expect(snapshotToCsv(snapshot)).toBe(
      'Rank,Team Name,PMR,FPTS\n' +
      '1,GridironGurus,60,95.5\n' +
      '2,"Smith, Jones & Co",,80\n' +
      '3,"Say ""hi""",0,0\n'
    );
  });

  test('writes very small and very large values as plain decimals', () => {
    const snapshot = buildSnapshot(
      [team('Tiny', 1, 0, 1e-7), team('Tinier', 2, 0, -2.5e-9), team('Huge', 3, 0, 1.25e21)],
      capturedAt
    );

    expect(snapshotToCsv(snapshot)).toBe(
      'Rank,Team Name,PMR,FPTS\n' +
      '1,Tiny,0,0.0000001\n' +
      '2,Tinier,0,-0.0000000025\n' +
      '3,Huge,0,1250000000000000000000\n'
    );
  });

  test('parseCsv honours quotes, CRLF and blank lines', () => {
    expect(parseCsv('a,"b,c",d\r\n\r\n"x ""y""",,z')).toEqual([
      ['a', 'b,c', 'd'],
      ['x "y"', '', 'z'],
    ]);
  });

  test('csvToRows locates columns by header name', () => {
    const text = 'FPTS,Team Name,Rank,PMR\n80.5,"Smith, Jones",2,15\n,,,\n';
    expect(csvToRows(text)).toEqual([{ rank: 2, teamName: 'Smith, Jones', pmr: 15, fpts: 80.5 }]);
  });

  test('csvToRows reads back what snapshotToCsv wrote', () => {
    const rows = [team('A', 1, 60, 95.5), team('B, Jr', 2, null, 80)];
    expect(csvToRows(snapshotToCsv(buildSnapshot(rows, capturedAt)))).toEqual(rows);
  });
});

test.describe('sleepCancellable', () => {
  test('returns true after the full interval', async () => {
    expect(await sleepCancellable(20, undefined, 5)).toBe(true);
  });

  test('returns false at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    expect(await sleepCancellable(60_000, controller.signal, 1_000)).toBe(false);
    expect(Date.now() - started).toBeLessThan(100);
  });

  test('wakes within a tick of an abort', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);
    const started = Date.now();

    expect(await sleepCancellable(60_000, controller.signal, 20)).toBe(false);
    expect(Date.now() - started).toBeLessThan(500);
  });
});
