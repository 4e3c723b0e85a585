/**
 * Centralized selectors and timing constants for the contest standings page.
 *
 * Field extraction is data-driven: each field has an ordered list of named
 * strategies and the first one yielding non-empty text wins. If the standings
 * UI changes, update the lists here; the extractor does not need to change.
 */

export type StandingsField = 'rank' | 'teamName' | 'pmr' | 'fpts';

export type FieldStrategy =
  | { name: string; kind: 'text'; selector: string }
  | { name: string; kind: 'attr'; attribute: string; prefix?: string };

/** Accessible label carried by every mounted row button */
export const ROW_LABEL_ATTRIBUTE = 'aria-label';
export const ROW_LABEL_PREFIX = 'view standings for ';

export const SELECTORS = {
  /** The virtualized standings table container */
  standingsTable:
    '.ReactVirtualized__Table.ContestStandings_contest-standings-table',

  /** Mounted rows, tried in order; the first selector matching anything wins */
  standingsRows: [
    '.ReactVirtualized__Table__row.ContestStandings_row',
    '[role="row"].ContestStandings_row',
    '.ContestStandings_row',
  ],
} as const;

/** Identity of a mounted row, independent of its DOM position */
export const ROW_IDENTITY_STRATEGIES: FieldStrategy[] = [
  { name: 'aria-label', kind: 'attr', attribute: ROW_LABEL_ATTRIBUTE, prefix: ROW_LABEL_PREFIX },
];

export const FIELD_STRATEGIES: Record<StandingsField, FieldStrategy[]> = {
  rank: [
    { name: 'rank-cell', kind: 'text', selector: '.ContestStandings_rank-cell' },
  ],
  teamName: [
    { name: 'team-name', kind: 'text', selector: '.UsernameWithEntryIndex_team-name' },
    { name: 'row-label', kind: 'attr', attribute: ROW_LABEL_ATTRIBUTE, prefix: ROW_LABEL_PREFIX },
  ],
  pmr: [
    { name: 'time-remaining-cell', kind: 'text', selector: '.column-timeRemaining [role="cell"] span' },
    { name: 'time-remaining-span', kind: 'text', selector: '.column-timeRemaining span' },
  ],
  fpts: [
    {
      name: 'points-cell-animated',
      kind: 'text',
      selector: '.ContestStandings_fantasy-points-cell .AnimatedNumber_animated-number span',
    },
    {
      name: 'points-column-animated',
      kind: 'text',
      selector: '.ContestStandings_column-fantasyPoints .AnimatedNumber_animated-number span',
    },
    { name: 'points-cell', kind: 'text', selector: '.ContestStandings_fantasy-points-cell' },
    { name: 'points-column', kind: 'text', selector: '.ContestStandings_column-fantasyPoints' },
  ],
};

/** Trailing unit labels stripped before numeric parsing */
export const UNIT_LABELS = ['FPTS', 'PTS', 'PMR'];

/** Site root used for the one-time interactive login */
export const DEFAULT_LOGIN_URL = 'https://www.draftkings.com';

/** Path to persisted browser state */
export const AUTH_STATE_PATH = './automation/authState.json';

/** File whose first non-empty line is the contest URL */
export const CONTESTS_FILE = './contests.txt';

/** Directory receiving one CSV per poll */
export const SNAPSHOT_DIR = './data_downloads';

/** Wait after the first navigation before looking for the table (ms) */
export const INITIAL_LOAD_DELAY = 10_000;

/** How long to wait for the standings table to mount (ms) */
export const TABLE_LOAD_TIMEOUT = 30_000;

/** Settle delay after scrolling the last mounted row into view (ms) */
export const SCROLL_SETTLE_MS = 500;

/** Max read/scroll iterations before the collector gives up */
export const MAX_SCROLL_ATTEMPTS = 120;

/** Sleep between a persisted snapshot and the next page reload (ms) */
export const POLL_INTERVAL_MS = 45_000;

/** Sleep after a page reload before the next collection (ms) */
export const REFRESH_SETTLE_MS = 15_000;

/** Sleep after a failed poll before retrying (ms) */
export const BACKOFF_MS = 60_000;

/** Granularity of cancellation checks during every sleep (ms) */
export const CANCEL_TICK_MS = 1_000;
