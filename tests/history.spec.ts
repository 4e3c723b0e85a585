import fs from 'fs';
import path from 'path';
import { test, expect } from '@playwright/test';
import { latestSnapshot, loadStandingsHistory, timeFromFileName } from '../automation/history';
import { buildSnapshot } from '../automation/scrape/helpers';
import { CsvSnapshotSink, snapshotFileName } from '../automation/sinks';
import { CaptureLogger, team } from './support/fakes';

const minuteOf = (iso: string) => Math.floor(Date.parse(iso) / 60_000);

test.describe('snapshot file names', () => {
  test('are stamped with the UTC capture time', () => {
    expect(snapshotFileName('2026-10-18T10:15:30.000Z')).toBe('standings_20261018_101530.csv');
    expect(snapshotFileName('2026-01-02T03:04:05.678Z')).toBe('standings_20260102_030405.csv');
  });

  test('yield a time index back', () => {
    expect(timeFromFileName('standings_20261018_101530.csv')).toEqual({
      timeIndex: minuteOf('2026-10-18T10:15:30Z'),
      capturedAt: new Date('2026-10-18T10:15:30.000Z'),
    });
    expect(timeFromFileName('example_standings_29341234.csv')?.timeIndex).toBe(29341234);
    expect(timeFromFileName('notes.csv')).toBeNull();
    expect(timeFromFileName('standings_latest.csv')).toBeNull();
  });
});

test.describe('CsvSnapshotSink', () => {
  test('writes one CSV per snapshot', async () => {
    const dir = test.info().outputPath('snapshots');
    const logger = new CaptureLogger();
    const snapshot = buildSnapshot(
      [team('GridironGurus', 1, 60, 95.5), team('Smith, Jones & Co', 2, null, 80)],
      new Date('2026-10-18T10:15:30.000Z')
    );

    await new CsvSnapshotSink(dir, logger).write(snapshot);

    const file = path.join(dir, 'standings_20261018_101530.csv');
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      'Rank,Team Name,PMR,FPTS\n' +
      '1,GridironGurus,60,95.5\n' +
      '2,"Smith, Jones & Co",,80\n'
    );
    expect(logger.lines).toEqual([`  [csv] 2 entries -> ${file}`]);
  });
});

test.describe('loadStandingsHistory', () => {
  test('reads snapshots back in time order', async () => {
    const dir = test.info().outputPath('history');
    const sink = new CsvSnapshotSink(dir, new CaptureLogger());
    const late = buildSnapshot([team('A', 1, 30, 90)], new Date('2026-10-18T10:20:00.000Z'));
    const early = buildSnapshot([team('A', 1, 60, 80), team('B', 2, 90, 70)], new Date('2026-10-18T10:15:30.000Z'));
    await sink.write(late);
    await sink.write(early);

    const history = loadStandingsHistory(dir);

    expect(history.map(s => s.timeIndex)).toEqual([minuteOf('2026-10-18T10:15:00Z'), minuteOf('2026-10-18T10:20:00Z')]);
    expect(history[0].entries).toEqual(early.entries);
    expect(history[0].capturedAt).toBe('2026-10-18T10:15:30.000Z');
    expect(latestSnapshot(dir)?.entries).toEqual(late.entries);
  });

  test('the later file wins a shared minute and unusable files are skipped', () => {
    const dir = test.info().outputPath('collisions');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'standings_20261018_101500.csv'), 'Rank,Team Name,PMR,FPTS\n1,Old,60,10\n');
    fs.writeFileSync(path.join(dir, 'standings_20261018_101545.csv'), 'Rank,Team Name,PMR,FPTS\n1,New,59,12\n');
    fs.writeFileSync(path.join(dir, 'standings_20261018_101600.csv'), 'Rank,Team Name,PMR,FPTS\n');
    fs.writeFileSync(path.join(dir, 'notes.csv'), 'Rank,Team Name,PMR,FPTS\n1,Ignored,1,1\n');
    fs.writeFileSync(path.join(dir, 'example_standings_100.csv'), 'Rank,Team Name,PMR,FPTS\n1,Indexed,5,3\n');

    const history = loadStandingsHistory(dir);

    expect(history.map(s => s.timeIndex)).toEqual([100, minuteOf('2026-10-18T10:15:00Z')]);
    expect(history[0].entries[0].teamName).toBe('Indexed');
    expect(history[1].entries).toEqual([{ rank: 1, teamName: 'New', pmr: 59, fpts: 12 }]);
  });

  test('a missing directory is an empty history', () => {
    expect(loadStandingsHistory(test.info().outputPath('does-not-exist'))).toEqual([]);
    expect(latestSnapshot(test.info().outputPath('does-not-exist'))).toBeNull();
  });
});
