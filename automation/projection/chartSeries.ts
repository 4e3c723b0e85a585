/**
 * Reshape per-snapshot reports into per-team series for the dashboard's
 * two charts: projected final points with a ±1 stdDev band, and win
 * probability stacked across teams.
 */

import { ProjectionReport } from './winProbability';

export interface ProjectedPoint {
  timeIndex: number;
  projectedFinal: number;
  stdDev: number;
}

export interface TeamSeries {
  teamName: string;
  /** CSS colour, spread evenly around the hue wheel */
  color: string;
  /** Only the time indices where the team was projected */
  projected: ProjectedPoint[];
  /** Aligned with `ChartData.timeIndices`; 0 where the team is absent */
  winProbability: number[];
}

export interface ChartData {
  timeIndices: number[];
  teams: TeamSeries[];
}

/**
 * Degraded reports carry no simulation and are left out. Teams keep the
 * order in which they first appear.
 */
export function buildChartData(reports: readonly ProjectionReport[]): ChartData {
  const simulated = reports.filter(r => !r.degraded);
  const timeIndices = simulated.map(r => r.timeIndex);

  const names: string[] = [];
  const seen = new Set<string>();
  for (const report of simulated) {
    for (const { teamName } of report.results) {
      if (seen.has(teamName)) continue;
      seen.add(teamName);
      names.push(teamName);
    }
  }

  const teams = names.map((teamName, i): TeamSeries => ({
    teamName,
    color: `hsl(${Math.round((i * 360) / names.length)}, 70%, 50%)`,
    projected: [],
    winProbability: new Array<number>(simulated.length).fill(0),
  }));
  const byName = new Map(teams.map(t => [t.teamName, t]));

  simulated.forEach((report, column) => {
    for (const result of report.results) {
      const series = byName.get(result.teamName);
      if (!series) continue;
      series.projected.push({
        timeIndex: report.timeIndex,
        projectedFinal: result.projectedFinal,
        stdDev: result.stdDev,
      });
      series.winProbability[column] = result.winProbability;
    }
  });

  return { timeIndices, teams };
}
