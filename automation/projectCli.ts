/**
 * Prints the projection for the latest stored snapshot.
 *
 * Usage:
 *   npx tsx automation/projectCli.ts
 *   npx tsx automation/projectCli.ts --dir=./data_downloads --seed=42 --sims=50000
 */

import dotenv from 'dotenv';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { loadStandingsHistory } from './history';
import { ProjectionReport, projectSnapshot } from './projection/winProbability';
import { StandingsSnapshot } from './scrape/helpers';

export function formatProjectionTable(snapshot: StandingsSnapshot, report: ProjectionReport): string {
  const fptsByTeam = new Map<string, number | null>();
  for (const e of snapshot.entries) {
    if (e.teamName !== null) fptsByTeam.set(e.teamName, e.fpts);
  }

  const sorted = [...report.results].sort((a, b) => b.projectedFinal - a.projectedFinal);
  const nameWidth = Math.max(4, ...sorted.map(r => r.teamName.length));

  const lines = [
    `Time index ${report.timeIndex}${report.degraded ? ` (DEGRADED: ${report.reason})` : ''}`,
    `${'#'.padStart(3)}  ${'Team'.padEnd(nameWidth)}  ${'FPTS'.padStart(7)}  ${'Proj'.padStart(7)}  ${'±SD'.padStart(6)}  ${'Win'.padStart(6)}`,
  ];

  sorted.forEach((r, i) => {
    const fpts = fptsByTeam.get(r.teamName);
    lines.push(
      `${String(i + 1).padStart(3)}  ${r.teamName.padEnd(nameWidth)}  ` +
      `${(fpts != null ? fpts.toFixed(1) : '-').padStart(7)}  ` +
      `${r.projectedFinal.toFixed(1).padStart(7)}  ` +
      `${r.stdDev.toFixed(2).padStart(6)}  ` +
      `${(r.winProbability * 100).toFixed(1).padStart(5)}%`
    );
  });

  if (report.excluded.length > 0) {
    lines.push(`Excluded (missing FPTS or PMR): ${report.excluded.join(', ')}`);
  }

  return lines.join('\n');
}

function main(): number {
  const config = loadConfig(process.env, process.argv.slice(2));
  const history = loadStandingsHistory(config.snapshotDir);

  if (history.length === 0) {
    console.error(`No snapshots found in ${config.snapshotDir}`);
    return 1;
  }

  const latest = history[history.length - 1];
  const report = projectSnapshot(latest, config.projection);
  console.log(formatProjectionTable(latest, report));
  return 0;
}

if (require.main === module) {
  dotenv.config();
  try {
    process.exitCode = main();
  } catch (err: unknown) {
    console.error(`Projection failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
