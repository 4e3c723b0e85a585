/**
 * Snapshot extractor: rendered markup → StandingsRow[].
 *
 * Pure transform: no network, no scrolling. Every field is resolved through
 * the ordered strategy lists in ../selectors; the first strategy producing
 * non-empty text wins, even when that text then fails to parse.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import {
  FIELD_STRATEGIES,
  FieldStrategy,
  ROW_IDENTITY_STRATEGIES,
  SELECTORS,
  StandingsField,
} from '../selectors';
import { StandingsRow, hasAnyField, parseDecimal, parseInteger } from './helpers';

export interface MountedRow {
  /** Stable per-row identity (accessible label, else team name) */
  identity: string | null;
  row: StandingsRow;
  /** Name of the strategy that resolved each field */
  resolvedBy: Partial<Record<StandingsField, string>>;
}

function readStrategy($row: Cheerio<Element>, strategy: FieldStrategy): string {
  if (strategy.kind === 'text') {
    return $row.find(strategy.selector).first().text().trim();
  }

  const value = ($row.attr(strategy.attribute) ?? '').trim();
  if (!strategy.prefix) return value;
  // A prefixed attribute that does not carry the prefix is not this row's label
  if (!value.toLowerCase().startsWith(strategy.prefix.toLowerCase())) return '';
  return value.slice(strategy.prefix.length).trim();
}

/** First non-empty text among the strategies, with the winning strategy name. */
export function resolveField(
  $row: Cheerio<Element>,
  strategies: readonly FieldStrategy[]
): { text: string; strategy: string } | null {
  for (const strategy of strategies) {
    const text = readStrategy($row, strategy);
    if (text) return { text, strategy: strategy.name };
  }
  return null;
}

export interface MountedRows {
  rows: MountedRow[];
  /**
   * The row selector that matched, scoped to the standings table when one is
   * present; null when no row element was found at all.
   */
  rowSelector: string | null;
}

function findRows($: CheerioAPI): { rows: Cheerio<Element>; rowSelector: string | null } {
  const table = $(SELECTORS.standingsTable).first();
  const scoped = table.length > 0;
  const select = (selector: string) => (scoped ? table.find(selector) : $<Element, string>(selector));

  for (const selector of SELECTORS.standingsRows) {
    const rows = select(selector);
    if (rows.length > 0) {
      return { rows, rowSelector: scoped ? `${SELECTORS.standingsTable} ${selector}` : selector };
    }
  }
  return { rows: select(SELECTORS.standingsRows[0]), rowSelector: null };
}

export function readMountedRows(markup: string): MountedRows {
  const $ = cheerio.load(markup);
  const { rows, rowSelector } = findRows($);
  const result: MountedRow[] = [];

  for (const el of rows.toArray()) {
    const $row = $(el);
    const resolvedBy: MountedRow['resolvedBy'] = {};

    const text = (field: StandingsField): string | null => {
      const hit = resolveField($row, FIELD_STRATEGIES[field]);
      if (!hit) return null;
      resolvedBy[field] = hit.strategy;
      return hit.text;
    };

    const pmr = parseInteger(text('pmr'));
    const row: StandingsRow = {
      rank: parseInteger(text('rank')),
      teamName: text('teamName'),
      pmr: pmr !== null && pmr >= 0 ? pmr : null,
      fpts: parseDecimal(text('fpts')),
    };

    if (!hasAnyField(row)) continue;

    const identity = resolveField($row, ROW_IDENTITY_STRATEGIES)?.text ?? row.teamName;
    result.push({ identity, row, resolvedBy });
  }

  return { rows: result, rowSelector };
}

export function extractMountedRows(markup: string): MountedRow[] {
  return readMountedRows(markup).rows;
}

/** The extraction contract: mounted rows in document order. */
export function extractStandingsRows(markup: string): StandingsRow[] {
  return extractMountedRows(markup).map(m => m.row);
}
