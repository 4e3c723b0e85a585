import { test, expect } from '@playwright/test';
import { formatProjectionTable } from '../automation/projectCli';
import { ProjectionReport } from '../automation/projection/winProbability';
import { buildSnapshot } from '../automation/scrape/helpers';
import { team } from './support/fakes';

const snapshot = buildSnapshot(
  [team('A', 1, 60, 80), team('Bee', 2, 90, 75), team('NoMinutes', 3, null, 70)],
  new Date('2026-10-18T10:15:30.000Z'),
  100
);

test.describe('formatProjectionTable', () => {
  test('lists teams by projected final with excluded teams last', () => {
    const report: ProjectionReport = {
      timeIndex: 100,
      degraded: false,
      results: [
        { teamName: 'A', projectedFinal: 95, stdDev: Math.sqrt(30), winProbability: 0.25 },
        { teamName: 'Bee', projectedFinal: 97.5, stdDev: Math.sqrt(45), winProbability: 0.75 },
      ],
      excluded: ['NoMinutes'],
    };

    expect(formatProjectionTable(snapshot, report).split('\n')).toEqual([
      'Time index 100',
      '  #  Team     FPTS     Proj     ±SD     Win',
      '  1  Bee      75.0     97.5    6.71   75.0%',
      '  2  A        80.0     95.0    5.48   25.0%',
      'Excluded (missing FPTS or PMR): NoMinutes',
    ]);
  });

  test('flags a degraded report in the heading', () => {
    const report: ProjectionReport = {
      timeIndex: 100,
      degraded: true,
      reason: 'sims must be a positive integer, got 0',
      results: [],
      excluded: [],
    };

    expect(formatProjectionTable(snapshot, report).split('\n')[0]).toBe(
      'Time index 100 (DEGRADED: sims must be a positive integer, got 0)'
    );
  });
});
