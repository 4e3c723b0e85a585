import fs from 'fs';
import path from 'path';
import { test, expect } from '@playwright/test';
import { extractMountedRows, extractStandingsRows, readMountedRows } from '../automation/scrape/extractor';

const page = fs.readFileSync(path.join(__dirname, 'fixtures', 'standings_page.html'), 'utf-8');

test.describe('extractStandingsRows', () => {
  test('reads every mounted row inside the standings table', () => {
    expect(extractStandingsRows(page)).toEqual([
      { rank: 1, teamName: 'GridironGurus', pmr: 60, fpts: 1080.5 },
      { rank: 2, teamName: 'EndZoneElite', pmr: 90, fpts: 75 },
      { rank: 3, teamName: 'Blitz Brigade', pmr: 360, fpts: null },
    ]);
  });

  test('records which strategy resolved each field', () => {
    const [first, second, third] = extractMountedRows(page);

    expect(first.resolvedBy).toEqual({
      rank: 'rank-cell',
      teamName: 'team-name',
      pmr: 'time-remaining-cell',
      fpts: 'points-cell-animated',
    });
    expect(second.resolvedBy.pmr).toBe('time-remaining-span');
    expect(second.resolvedBy.fpts).toBe('points-cell');
    expect(third.resolvedBy.teamName).toBe('row-label');
    expect(third.resolvedBy.fpts).toBeUndefined();
  });

  test('uses the accessible label as row identity', () => {
    expect(extractMountedRows(page).map(m => m.identity)).toEqual([
      'GridironGurus',
      'EndZoneElite',
      'Blitz Brigade',
    ]);
  });

  test('falls back to the team name when a row has no label', () => {
    const markup =
      '<div class="ContestStandings_row">' +
      '<div class="ContestStandings_rank-cell">4</div>' +
      '<div class="UsernameWithEntryIndex_team-name">NoLabel</div>' +
      '</div>';

    const [mounted] = extractMountedRows(markup);
    expect(mounted.identity).toBe('NoLabel');
    expect(mounted.row).toEqual({ rank: 4, teamName: 'NoLabel', pmr: null, fpts: null });
  });

  test('ignores a label that does not carry the standings prefix', () => {
    const markup =
      '<div class="ContestStandings_row" aria-label="open menu">' +
      '<div class="ContestStandings_rank-cell">5</div>' +
      '</div>';

    const [mounted] = extractMountedRows(markup);
    expect(mounted.identity).toBeNull();
    expect(mounted.row.teamName).toBeNull();
  });

  test('first non-empty strategy wins even when it does not parse', () => {
    const markup =
      '<div class="ContestStandings_row" aria-label="view standings for Dashes">' +
      '<div class="ContestStandings_fantasy-points-cell">' +
      '<div class="AnimatedNumber_animated-number"><span>--</span></div>' +
      '</div>' +
      '<div class="ContestStandings_column-fantasyPoints">12</div>' +
      '</div>';

    const [mounted] = extractMountedRows(markup);
    expect(mounted.resolvedBy.fpts).toBe('points-cell-animated');
    expect(mounted.row.fpts).toBeNull();
  });

  test('a negative minutes-remaining value is treated as missing', () => {
    const markup =
      '<div class="ContestStandings_row" aria-label="view standings for Oddity">' +
      '<div class="column-timeRemaining"><span>−5</span></div>' +
      '</div>';

    expect(extractStandingsRows(markup)).toEqual([
      { rank: null, teamName: 'Oddity', pmr: null, fpts: null },
    ]);
  });

  test('returns nothing when no rows are mounted', () => {
    expect(extractStandingsRows('<html><body><p>Loading…</p></body></html>')).toEqual([]);
  });
});

test.describe('readMountedRows', () => {
  const table = '.ReactVirtualized__Table.ContestStandings_contest-standings-table';

  test('reports the first row selector that matched, scoped to the table', () => {
    const { rows, rowSelector } = readMountedRows(page);
    expect(rows).toHaveLength(3);
    expect(rowSelector).toBe(`${table} .ReactVirtualized__Table__row.ContestStandings_row`);
  });

  test('reports a fallback selector when the preferred one matches nothing', () => {
    const markup =
      '<div class="ReactVirtualized__Table ContestStandings_contest-standings-table">' +
      '<div class="ContestStandings_row" aria-label="view standings for Plain">' +
      '<div class="ContestStandings_rank-cell">7</div>' +
      '</div>' +
      '</div>';

    const { rows, rowSelector } = readMountedRows(markup);
    expect(rows.map(m => m.identity)).toEqual(['Plain']);
    expect(rowSelector).toBe(`${table} .ContestStandings_row`);
  });

  test('leaves the selector unscoped without a standings table', () => {
    const markup = '<div role="row" class="ContestStandings_row"><div class="ContestStandings_rank-cell">8</div></div>';
    expect(readMountedRows(markup).rowSelector).toBe('[role="row"].ContestStandings_row');
  });

  test('has no selector when no row element exists', () => {
    expect(readMountedRows('<html><body><p>Loading…</p></body></html>')).toEqual({ rows: [], rowSelector: null });
  });
});
