/**
 * Local Express server: read-only API + dashboard over the scheduler.
 *
 * Endpoints:
 *   GET  /                       HTML dashboard
 *   GET  /api/status             scheduler state, last poll, failures
 *   GET  /api/standings/latest   latest snapshot and its projection
 *   GET  /api/history            projection per stored time index, plus chart series
 *
 * The server only reads through status() / latestSnapshot(); it never
 * touches the browser session. Projections are cached per snapshot and
 * simulated in slices, so a request never holds the scheduler's timers.
 */

import dotenv from 'dotenv';
import express from 'express';
import type { Server } from 'http';
import { loadConfig } from '../automation/config';
import { errorMessage } from '../automation/errors';
import { latestSnapshot, loadStandingsHistory } from '../automation/history';
import { acquireLock, releaseLock } from '../automation/lock';
import { buildChartData } from '../automation/projection/chartSeries';
import { ProjectionCache } from '../automation/projection/projectionCache';
import { ProjectionParams, ProjectionReport } from '../automation/projection/winProbability';
import type { PollScheduler, SchedulerStatus } from '../automation/scheduler';
import { createScheduler, stopOnSignals } from '../automation/schedulerCli';
import { StandingsSnapshot } from '../automation/scrape/helpers';
import { closePool } from '../automation/db/client';

export interface StandingsReader {
  status(): SchedulerStatus;
  latestSnapshot(): StandingsSnapshot | null;
}

export interface AppOptions {
  /** Absent when the server only reads stored snapshots */
  scheduler?: StandingsReader;
  snapshotDir: string;
  projection: ProjectionParams;
  /** Defaults to a fresh cache over `projection` */
  cache?: ProjectionCache;
}

function byProjectedFinal(report: ProjectionReport): ProjectionReport {
  return {
    ...report,
    results: [...report.results].sort((a, b) => b.projectedFinal - a.projectedFinal),
  };
}

export function createApp(opts: AppOptions): express.Express {
  const app = express();
  const projections = opts.cache ?? new ProjectionCache(opts.projection);

  app.get('/api/status', (_req, res) => {
    res.json(opts.scheduler ? opts.scheduler.status() : { state: 'DETACHED' });
  });

  app.get('/api/standings/latest', async (_req, res, next) => {
    try {
      const snapshot = opts.scheduler?.latestSnapshot() ?? latestSnapshot(opts.snapshotDir);
      if (!snapshot) {
        res.status(404).json({ error: 'No snapshot captured yet' });
        return;
      }
      const projection = await projections.project(snapshot);
      res.json({ snapshot, projection: byProjectedFinal(projection) });
    } catch (err: unknown) {
      next(err);
    }
  });

  app.get('/api/history', async (_req, res, next) => {
    try {
      const series = await projections.history(loadStandingsHistory(opts.snapshotDir));
      res.json({ series, charts: buildChartData(series) });
    } catch (err: unknown) {
      next(err);
    }
  });

  app.get('/', (_req, res) => {
    res.type('html').send(DASHBOARD_HTML);
  });

  return app;
}

// ---------------------------------------------------------------------------
// Dashboard HTML
// ---------------------------------------------------------------------------

const DASHBOARD_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Contest Standings</title>
  <style>
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
      background: #1a1a1a;
      color: #e1e4e8;
      padding: 2rem;
      max-width: 960px;
      margin: 0 auto;
    }
    h1 { margin-bottom: 1.5rem; text-align: center; }
    .card {
      background: #161b22;
      border: 1px solid #30363d;
      border-radius: 8px;
      padding: 1.25rem;
      margin-bottom: 1rem;
    }
    .card h2 { font-size: 1rem; color: #8b949e; margin-bottom: 0.75rem; }
    .status-badge {
      display: inline-block;
      padding: 0.25rem 0.75rem;
      border-radius: 12px;
      font-size: 0.85rem;
      font-weight: 600;
      background: #30363d;
    }
    .status-POLLING, .status-REFRESHING, .status-READY { background: #238636; color: #fff; }
    .status-RETRY_BACKOFF, .status-AUTHENTICATING     { background: #d29922; color: #fff; }
    .status-ERROR, .status-CLOSED                     { background: #da3633; color: #fff; }
    table { width: 100%; border-collapse: collapse; }
    th, td { padding: 8px; border: 1px solid #444; text-align: center; }
    th { background: #333; }
    td.team { text-align: left; }
    .meta { color: #8b949e; font-size: 0.85rem; margin-top: 0.5rem; }
    .degraded { color: #d29922; }
    svg.chart { width: 100%; height: 320px; display: block; }
    svg.chart text { fill: #8b949e; font-size: 11px; }
    svg.chart .axis { stroke: #444; }
    .legend { display: flex; flex-wrap: wrap; gap: 0.5rem 1rem; margin-top: 0.5rem; font-size: 0.85rem; }
    .legend span::before {
      content: ''; display: inline-block; width: 10px; height: 10px;
      margin-right: 4px; background: var(--swatch);
    }
  </style>
</head>
<body>
  <h1>Contest Standings</h1>

  <div class="card">
    <h2>Scheduler</h2>
    <span id="state-badge" class="status-badge">checking...</span>
    <div id="status-meta" class="meta"></div>
  </div>

  <div class="card">
    <h2 id="standings-title">Current Standings</h2>
    <table>
      <thead>
        <tr><th>#</th><th>Team</th><th>Current FPTS</th><th>Projected Final</th><th>Win Probability</th></tr>
      </thead>
      <tbody id="standings-body"><tr><td colspan="5">Loading...</td></tr></tbody>
    </table>
  </div>

  <div class="card">
    <h2>Projected Final Points Over Time</h2>
    <svg id="points-chart" class="chart" viewBox="0 0 900 320" preserveAspectRatio="none"></svg>
    <div id="points-legend" class="legend"></div>
  </div>

  <div class="card">
    <h2>Win Probability Over Time</h2>
    <svg id="winprob-chart" class="chart" viewBox="0 0 900 320" preserveAspectRatio="none"></svg>
    <div id="winprob-legend" class="legend"></div>
  </div>

  <script>
    function cell(text, cls) {
      const td = document.createElement('td');
      td.textContent = text;
      if (cls) td.className = cls;
      return td;
    }

    async function fetchStatus() {
      try {
        const res = await fetch('/api/status');
        const data = await res.json();
        const badge = document.getElementById('state-badge');
        badge.textContent = data.state;
        badge.className = 'status-badge status-' + data.state;
        document.getElementById('status-meta').textContent = data.state === 'DETACHED'
          ? 'Reading stored snapshots only'
          : 'Polls: ' + data.pollCount
            + ' | Last success: ' + (data.lastSuccessAt || 'never')
            + ' | Failures in a row: ' + data.consecutiveFailures
            + (data.lastError ? ' | Last error: ' + data.lastError : '');
      } catch (err) {
        document.getElementById('status-meta').textContent = 'Status unavailable: ' + err;
      }
    }

    async function fetchStandings() {
      const body = document.getElementById('standings-body');
      try {
        const res = await fetch('/api/standings/latest');
        if (res.status === 404) {
          body.innerHTML = '<tr><td colspan="5">No snapshot captured yet</td></tr>';
          return;
        }
        const { snapshot, projection } = await res.json();
        const fpts = {};
        snapshot.entries.forEach(e => { if (e.teamName !== null) fpts[e.teamName] = e.fpts; });

        const title = document.getElementById('standings-title');
        title.textContent = 'Current Standings (Time Index: ' + snapshot.timeIndex + ')';
        if (projection.degraded) {
          title.textContent += ' - projection unavailable: ' + projection.reason;
          title.className = 'degraded';
        } else {
          title.className = '';
        }

        body.replaceChildren(...projection.results.map((r, i) => {
          const tr = document.createElement('tr');
          const current = fpts[r.teamName];
          tr.append(
            cell(String(i + 1)),
            cell(r.teamName, 'team'),
            cell(current == null ? '-' : current.toFixed(1)),
            cell(r.projectedFinal.toFixed(1)),
            cell((r.winProbability * 100).toFixed(1) + '%'),
          );
          return tr;
        }));
      } catch (err) {
        body.innerHTML = '<tr><td colspan="5">Standings unavailable</td></tr>';
      }
    }

    const SVG_NS = 'http://www.w3.org/2000/svg';
    const W = 900, H = 320, PAD = { left: 50, right: 10, top: 10, bottom: 30 };

    function svgEl(name, attrs) {
      const el = document.createElementNS(SVG_NS, name);
      Object.entries(attrs).forEach(([k, v]) => el.setAttribute(k, String(v)));
      return el;
    }

    function scale(domainMin, domainMax, rangeMin, rangeMax) {
      const span = domainMax - domainMin || 1;
      return v => rangeMin + ((v - domainMin) / span) * (rangeMax - rangeMin);
    }

    function axes(svg, xs, yMin, yMax, yLabel) {
      const x = scale(Math.min(...xs), Math.max(...xs), PAD.left, W - PAD.right);
      const y = scale(yMin, yMax, H - PAD.bottom, PAD.top);
      svg.append(
        svgEl('line', { class: 'axis', x1: PAD.left, y1: H - PAD.bottom, x2: W - PAD.right, y2: H - PAD.bottom }),
        svgEl('line', { class: 'axis', x1: PAD.left, y1: PAD.top, x2: PAD.left, y2: H - PAD.bottom }),
      );
      [[yMin, H - PAD.bottom], [yMax, PAD.top + 10]].forEach(([v, py]) => {
        const t = svgEl('text', { x: 4, y: py });
        t.textContent = yLabel(v);
        svg.append(t);
      });
      [[xs[0], PAD.left], [xs[xs.length - 1], W - PAD.right - 60]].forEach(([v, px]) => {
        const t = svgEl('text', { x: px, y: H - 8 });
        t.textContent = 'T' + v;
        svg.append(t);
      });
      return { x, y };
    }

    function legend(id, teams) {
      document.getElementById(id).replaceChildren(...teams.map(t => {
        const span = document.createElement('span');
        span.style.setProperty('--swatch', t.color);
        span.textContent = t.teamName;
        return span;
      }));
    }

    function drawPoints(charts) {
      const svg = document.getElementById('points-chart');
      svg.replaceChildren();
      const points = charts.teams.flatMap(t => t.projected);
      if (points.length === 0) return;
      const lo = Math.min(...points.map(p => p.projectedFinal - p.stdDev));
      const hi = Math.max(...points.map(p => p.projectedFinal + p.stdDev));
      const { x, y } = axes(svg, charts.timeIndices, lo, hi, v => v.toFixed(0));

      charts.teams.forEach(t => {
        const upper = t.projected.map(p => x(p.timeIndex) + ',' + y(p.projectedFinal + p.stdDev));
        const lower = t.projected.map(p => x(p.timeIndex) + ',' + y(p.projectedFinal - p.stdDev)).reverse();
        svg.append(svgEl('polygon', { points: upper.concat(lower).join(' '), fill: t.color, 'fill-opacity': 0.2, stroke: 'none' }));
        svg.append(svgEl('polyline', {
          points: t.projected.map(p => x(p.timeIndex) + ',' + y(p.projectedFinal)).join(' '),
          fill: 'none', stroke: t.color, 'stroke-width': 2,
        }));
      });
      legend('points-legend', charts.teams);
    }

    function drawWinProbability(charts) {
      const svg = document.getElementById('winprob-chart');
      svg.replaceChildren();
      if (charts.timeIndices.length === 0) return;
      const { x, y } = axes(svg, charts.timeIndices, 0, 1, v => (v * 100).toFixed(0) + '%');

      let base = charts.timeIndices.map(() => 0);
      charts.teams.forEach(t => {
        const top = base.map((b, i) => b + t.winProbability[i]);
        const upper = charts.timeIndices.map((ti, i) => x(ti) + ',' + y(top[i]));
        const lower = charts.timeIndices.map((ti, i) => x(ti) + ',' + y(base[i])).reverse();
        svg.append(svgEl('polygon', { points: upper.concat(lower).join(' '), fill: t.color, 'fill-opacity': 0.8, stroke: t.color }));
        base = top;
      });
      legend('winprob-legend', charts.teams);
    }

    async function fetchHistory() {
      try {
        const res = await fetch('/api/history');
        const { charts } = await res.json();
        drawPoints(charts);
        drawWinProbability(charts);
      } catch (err) {
        document.getElementById('points-legend').textContent = 'History unavailable: ' + err;
      }
    }

    function refresh() {
      fetchStatus();
      fetchStandings();
    }

    refresh();
    fetchHistory();
    setInterval(refresh, 15000);
    setInterval(fetchHistory, 60000);
  </script>
</body>
</html>`;

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const config = loadConfig(process.env, argv);
  const detached = argv.includes('--detached');

  let scheduler: PollScheduler | undefined;
  if (!detached) {
    if (!acquireLock()) {
      throw new Error('Another scheduler is already running (lock file exists); use --detached');
    }
    scheduler = createScheduler(config);
  }

  const app = createApp({ scheduler, snapshotDir: config.snapshotDir, projection: config.projection });
  const server: Server = app.listen(config.port, () => {
    console.log('');
    console.log('=== Contest Standings Server ===');
    console.log(`Dashboard: http://localhost:${config.port}`);
    console.log('');
    console.log('API:');
    console.log(`  GET  http://localhost:${config.port}/api/status`);
    console.log(`  GET  http://localhost:${config.port}/api/standings/latest`);
    console.log(`  GET  http://localhost:${config.port}/api/history`);
    console.log('');
  });

  if (scheduler) {
    stopOnSignals(scheduler);
    try {
      await scheduler.start();
    } finally {
      releaseLock();
      server.close();
      await closePool();
    }
  }
}

if (require.main === module) {
  dotenv.config();
  main().catch((err: unknown) => {
    console.error(`Server failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
