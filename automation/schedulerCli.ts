/**
 * CLI entry point for the standings scheduler.
 *
 * Usage:
 *   npx tsx automation/schedulerCli.ts
 *   npx tsx automation/schedulerCli.ts --headless=true
 *   npx tsx automation/schedulerCli.ts --dir=./data_downloads --no-db
 *
 * Runs until Ctrl+C (or SIGTERM), then closes the browser and exits.
 */

import dotenv from 'dotenv';
import { TrackerConfig, loadConfig } from './config';
import { errorMessage } from './errors';
import { acquireLock, releaseLock } from './lock';
import { PollScheduler } from './scheduler';
import { StandingsSession } from './session';
import { CsvSnapshotSink, SnapshotSink } from './sinks';
import { closePool } from './db/client';
import { PgSnapshotSink } from './db/persistSnapshot';
import { Logger } from './scrape/helpers';

export function createScheduler(config: TrackerConfig, logger: Logger = console): PollScheduler {
  const sinks: SnapshotSink[] = [new CsvSnapshotSink(config.snapshotDir, logger)];
  if (config.databaseUrl) {
    sinks.push(new PgSnapshotSink(undefined, logger));
  } else {
    logger.log('[db] Skipped (DATABASE_URL not set or --no-db)');
  }

  const session = new StandingsSession(config, { logger });
  return new PollScheduler(session, config.timings, { sinks, logger });
}

/** Stop the scheduler on Ctrl+C / SIGTERM; a second signal exits at once. */
export function stopOnSignals(scheduler: PollScheduler): void {
  let signalled = false;
  const onSignal = (sig: NodeJS.Signals) => {
    if (signalled) process.exit(130);
    signalled = true;
    console.log(`\nReceived ${sig}, stopping scheduler...`);
    scheduler.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

async function main(): Promise<number> {
  const config = loadConfig(process.env, process.argv.slice(2));

  console.log('=== Standings Scheduler ===');
  console.log(`Snapshots: ${config.snapshotDir}`);
  console.log(`Headless:  ${config.headless}`);
  console.log(
    `Timings:   poll ${config.timings.pollIntervalMs}ms, ` +
    `settle ${config.timings.refreshSettleMs}ms, backoff ${config.timings.backoffMs}ms`
  );
  console.log('');

  if (!acquireLock()) {
    console.error('Another scheduler is already running (lock file exists)');
    return 1;
  }

  try {
    const scheduler = createScheduler(config);
    stopOnSignals(scheduler);
    await scheduler.start();
    // The loop only ends on stop() or a fatal error
    return scheduler.status().stopRequested ? 0 : 1;
  } finally {
    await closePool().catch((err: unknown) => {
      console.error(`[db] Pool shutdown failed: ${errorMessage(err)}`);
    });
    releaseLock();
  }
}

// ---------------------------------------------------------------------------
// Direct CLI execution
// ---------------------------------------------------------------------------

if (require.main === module) {
  dotenv.config();
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(`Scheduler failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}
