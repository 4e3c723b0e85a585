/**
 * Persistence module: writes StandingsSnapshot data into Postgres.
 *
 * persistSnapshot():
 *   1. UPSERT standings_snapshots on time_index → get snapshot_id
 *   2. Replace the snapshot's standings_entries in batches
 *   3. Return { snapshotId, entriesPersisted }
 *
 * Tables are defined in ./schema.sql.
 */

import { QueryFn, query } from './client';
import { SnapshotSink } from '../sinks';
import { Logger, StandingsSnapshot, StandingsRow } from '../scrape/helpers';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PersistResult {
  snapshotId: string;
  entriesPersisted: number;
  durationMs: number;
}

// 5 params per row → 500 rows = 2500 params, well under the 65535 limit
const BATCH_SIZE = 500;
const COLS_PER_ROW = 5;

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export async function persistSnapshot(
  snapshot: StandingsSnapshot,
  run: QueryFn = query,
  logger: Logger = console
): Promise<PersistResult> {
  const startTime = Date.now();

  // ── 1. Upsert standings_snapshots ──────────────────────────────────
  const upserted = await run(
    `INSERT INTO standings_snapshots (time_index, captured_at, entry_count)
     VALUES ($1, $2, $3)
     ON CONFLICT (time_index) DO UPDATE SET
       captured_at = EXCLUDED.captured_at,
       entry_count = EXCLUDED.entry_count
     RETURNING id`,
    [snapshot.timeIndex, snapshot.capturedAt, snapshot.entries.length]
  );

  const snapshotRow = upserted.rows[0];
  if (!snapshotRow) {
    throw new Error('Failed to upsert standings_snapshots: no row returned');
  }

  // BIGSERIAL ids come back as strings
  const snapshotId = String(snapshotRow.id);

  // ── 2. Replace entries ─────────────────────────────────────────────
  await run('DELETE FROM standings_entries WHERE snapshot_id = $1', [snapshotId]);

  for (let i = 0; i < snapshot.entries.length; i += BATCH_SIZE) {
    await insertBatch(snapshotId, snapshot.entries.slice(i, i + BATCH_SIZE), run);
  }

  const durationMs = Date.now() - startTime;
  logger.log(
    `  [db] snapshot ${snapshot.timeIndex} persisted: ` +
    `${snapshot.entries.length} entries in ${durationMs}ms`
  );

  return { snapshotId, entriesPersisted: snapshot.entries.length, durationMs };
}

// ---------------------------------------------------------------------------
// Batch INSERT helper
// ---------------------------------------------------------------------------

async function insertBatch(
  snapshotId: string,
  rows: readonly StandingsRow[],
  run: QueryFn
): Promise<void> {
  if (rows.length === 0) return;

  const valuesClauses: string[] = [];
  const params: unknown[] = [];

  rows.forEach((row, i) => {
    const offset = i * COLS_PER_ROW;
    valuesClauses.push(
      `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5})`
    );
    params.push(
      snapshotId,     // 1 snapshot_id
      row.rank,       // 2 rank
      row.teamName,   // 3 team_name
      row.pmr,        // 4 pmr
      row.fpts,       // 5 fpts
    );
  });

  await run(
    `INSERT INTO standings_entries (snapshot_id, rank, team_name, pmr, fpts)
     VALUES ${valuesClauses.join(', ')}`,
    params
  );
}

// ---------------------------------------------------------------------------
// Sink adapter
// ---------------------------------------------------------------------------

export class PgSnapshotSink implements SnapshotSink {
  readonly name = 'postgres';
  private run: QueryFn;
  private logger: Logger;

  constructor(run: QueryFn = query, logger: Logger = console) {
    this.run = run;
    this.logger = logger;
  }

  async write(snapshot: StandingsSnapshot): Promise<void> {
    await persistSnapshot(snapshot, this.run, this.logger);
  }
}
