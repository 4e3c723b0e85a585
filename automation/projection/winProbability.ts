/**
 * Monte Carlo projection of final scores and win probabilities.
 *
 * Team i finishes at Normal(fpts_i + pmr_i · rate, sigma2 · pmr_i): a fixed
 * average scoring rate per remaining player minute, with variance growing
 * linearly in the minutes left. Each simulated trial is won by the highest
 * draw; a tie goes to the entry listed first.
 */

import seedrandom from 'seedrandom';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { ProjectionError, errorMessage } from '../errors';
import { StandingsSnapshot } from '../scrape/helpers';

export interface ProjectionParams {
  /** Variance added per remaining player minute */
  sigma2PerMinute: number;
  /** Expected points per remaining player minute */
  scoringRatePerMinute: number;
  sims: number;
  seed?: string | number;
}

export const DEFAULT_PROJECTION_PARAMS: ProjectionParams = {
  sigma2PerMinute: 0.5,
  scoringRatePerMinute: 0.25,
  sims: 20_000,
};

export interface ProjectionResult {
  teamName: string;
  projectedFinal: number;
  stdDev: number;
  winProbability: number;
}

export interface ProjectionReport {
  timeIndex: number;
  /** True when the numbers below are the neutral fallback, not a simulation */
  degraded: boolean;
  reason?: string;
  results: ProjectionResult[];
  /** Teams left out of the simulation for lack of fpts or pmr */
  excluded: string[];
}

interface Contender {
  teamName: string;
  mean: number;
  stdDev: number;
}

function assertParams(params: ProjectionParams): void {
  if (!Number.isInteger(params.sims) || params.sims < 1) {
    throw new ProjectionError(`sims must be a positive integer, got ${params.sims}`);
  }
  if (!Number.isFinite(params.sigma2PerMinute) || params.sigma2PerMinute < 0) {
    throw new ProjectionError(`sigma2PerMinute must be >= 0, got ${params.sigma2PerMinute}`);
  }
  if (!Number.isFinite(params.scoringRatePerMinute)) {
    throw new ProjectionError(`scoringRatePerMinute must be finite, got ${params.scoringRatePerMinute}`);
  }
}

/** Standard normal draws (Box–Muller) from a uniform source. */
export function normalSampler(uniform: () => number): () => number {
  let spare: number | null = null;

  return () => {
    if (spare !== null) {
      const z = spare;
      spare = null;
      return z;
    }
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - uniform();
    const u2 = uniform();
    const r = Math.sqrt(-2 * Math.log(u1));
    spare = r * Math.sin(2 * Math.PI * u2);
    return r * Math.cos(2 * Math.PI * u2);
  };
}

interface Field {
  contenders: Contender[];
  excluded: string[];
}

function fieldOf(snapshot: StandingsSnapshot, params: ProjectionParams): Field {
  assertParams(params);

  const contenders: Contender[] = [];
  const excluded: string[] = [];

  for (const entry of snapshot.entries) {
    if (entry.teamName === null) continue;
    if (entry.fpts === null || entry.pmr === null) {
      excluded.push(entry.teamName);
      continue;
    }
    if (!Number.isFinite(entry.fpts) || !Number.isFinite(entry.pmr) || entry.pmr < 0) {
      throw new ProjectionError(
        `Malformed entry for "${entry.teamName}": fpts=${entry.fpts}, pmr=${entry.pmr}`
      );
    }
    contenders.push({
      teamName: entry.teamName,
      mean: entry.fpts + entry.pmr * params.scoringRatePerMinute,
      stdDev: Math.sqrt(params.sigma2PerMinute * entry.pmr),
    });
  }

  return { contenders, excluded };
}

function samplerFor(params: ProjectionParams): () => number {
  return normalSampler(seedrandom(params.seed === undefined ? undefined : String(params.seed)));
}

function runTrials(contenders: readonly Contender[], draw: () => number, wins: number[], trials: number): void {
  for (let s = 0; s < trials; s++) {
    let best = 0;
    let bestValue = -Infinity;
    for (let i = 0; i < contenders.length; i++) {
      const c = contenders[i];
      const value = c.stdDev === 0 ? c.mean : c.mean + c.stdDev * draw();
      if (value > bestValue) {
        bestValue = value;
        best = i;
      }
    }
    wins[best]++;
  }
}

function reportOf(snapshot: StandingsSnapshot, field: Field, wins: number[], sims: number): ProjectionReport {
  return {
    timeIndex: snapshot.timeIndex,
    degraded: false,
    results: field.contenders.map((c, i) => ({
      teamName: c.teamName,
      projectedFinal: c.mean,
      stdDev: c.stdDev,
      winProbability: wins[i] / sims,
    })),
    excluded: field.excluded,
  };
}

/**
 * Simulate the snapshot's finish. Throws ProjectionError on malformed input.
 */
export function simulateWinProbabilities(
  snapshot: StandingsSnapshot,
  params: ProjectionParams = DEFAULT_PROJECTION_PARAMS
): ProjectionReport {
  const field = fieldOf(snapshot, params);
  const wins = new Array<number>(field.contenders.length).fill(0);

  if (field.contenders.length > 0) {
    runTrials(field.contenders, samplerFor(params), wins, params.sims);
  }
  return reportOf(snapshot, field, wins, params.sims);
}

/** Normal draws per slice before handing the event loop back */
export const DRAWS_PER_SLICE = 50_000;

/**
 * Same trials and result as `simulateWinProbabilities`, run in slices that
 * yield to the event loop so timers sharing the process keep firing.
 */
export async function simulateWinProbabilitiesAsync(
  snapshot: StandingsSnapshot,
  params: ProjectionParams = DEFAULT_PROJECTION_PARAMS
): Promise<ProjectionReport> {
  const field = fieldOf(snapshot, params);
  const wins = new Array<number>(field.contenders.length).fill(0);

  if (field.contenders.length > 0) {
    const draw = samplerFor(params);
    const slice = Math.max(1, Math.floor(DRAWS_PER_SLICE / field.contenders.length));
    for (let done = 0; done < params.sims; done += slice) {
      runTrials(field.contenders, draw, wins, Math.min(slice, params.sims - done));
      await yieldToLoop();
    }
  }
  return reportOf(snapshot, field, wins, params.sims);
}

/** Neutral output: current points as the projection, no win chances. */
export function degradedReport(snapshot: StandingsSnapshot, reason: string): ProjectionReport {
  const results: ProjectionResult[] = [];
  for (const entry of snapshot.entries) {
    if (entry.teamName === null) continue;
    results.push({
      teamName: entry.teamName,
      projectedFinal: entry.fpts !== null && Number.isFinite(entry.fpts) ? entry.fpts : 0,
      stdDev: 0,
      winProbability: 0,
    });
  }
  return { timeIndex: snapshot.timeIndex, degraded: true, reason, results, excluded: [] };
}

/** Project a snapshot; malformed input yields a degraded report instead of throwing. */
export function projectSnapshot(
  snapshot: StandingsSnapshot,
  params: ProjectionParams = DEFAULT_PROJECTION_PARAMS
): ProjectionReport {
  try {
    return simulateWinProbabilities(snapshot, params);
  } catch (err: unknown) {
    if (err instanceof ProjectionError) {
      return degradedReport(snapshot, errorMessage(err));
    }
    throw err;
  }
}

/** `projectSnapshot` on the yielding simulation. */
export async function projectSnapshotAsync(
  snapshot: StandingsSnapshot,
  params: ProjectionParams = DEFAULT_PROJECTION_PARAMS
): Promise<ProjectionReport> {
  try {
    return await simulateWinProbabilitiesAsync(snapshot, params);
  } catch (err: unknown) {
    if (err instanceof ProjectionError) {
      return degradedReport(snapshot, errorMessage(err));
    }
    throw err;
  }
}
