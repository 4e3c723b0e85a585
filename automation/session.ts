/**
 * StandingsSession: the one long-lived browser session.
 *
 * Owns a single Playwright browser, context and page, reused across polls so
 * each poll costs a reload instead of a fresh navigation and login. Not
 * reentrant: the scheduler never issues two operations at once.
 */

import { chromium, Browser, BrowserContext, Page } from 'playwright';
import fs from 'fs';
import { TrackerConfig, readTargetUrl } from './config';
import { SessionFatal, errorMessage } from './errors';
import { LoginPrompt, loginInteractively } from './authInit';
import { SELECTORS } from './selectors';
import { StandingsView, collectStandings } from './scrape/collector';
import { Logger, StandingsRow, settle } from './scrape/helpers';

/** What the scheduler drives; implemented here and by test doubles. */
export interface StandingsSource {
  /** Authenticate and land on the contest page; waits end early once `signal` aborts. */
  open(signal: AbortSignal): Promise<void>;
  collect(signal: AbortSignal): Promise<StandingsRow[]>;
  /** Full reload so the next collection sees fresh server data. */
  reload(): Promise<void>;
  /** Release everything; safe to call more than once. */
  close(): Promise<void>;
}

export type SessionConfig = Pick<
  TrackerConfig,
  | 'headless'
  | 'loginUrl'
  | 'contestsFile'
  | 'authStatePath'
  | 'initialLoadDelayMs'
  | 'tableLoadTimeoutMs'
  | 'collector'
  | 'timings'
>;

const CLOSED_TARGET = /Target (page, context or browser )?(has been )?closed|Browser has been closed|browser has disconnected/i;

export class StandingsSession implements StandingsSource, StandingsView {
  private config: SessionConfig;
  private logger: Logger;
  private prompt?: LoginPrompt;
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private closing: Promise<void> | null = null;

  constructor(config: SessionConfig, deps: { logger?: Logger; prompt?: LoginPrompt } = {}) {
    this.config = config;
    this.logger = deps.logger ?? console;
    this.prompt = deps.prompt;
  }

  async open(signal: AbortSignal): Promise<void> {
    // Config first: a missing target must not cost a browser launch
    const targetUrl = readTargetUrl(this.config.contestsFile);

    this.browser = await chromium.launch({ headless: this.config.headless });
    const hasAuthState = fs.existsSync(this.config.authStatePath);

    if (hasAuthState) {
      this.logger.log('[session] Authentication state found, loading from file.');
      this.context = await this.browser.newContext({
        storageState: this.config.authStatePath,
        viewport: { width: 1440, height: 900 },
      });
    } else {
      this.logger.log('[session] No authentication state found, interactive login required.');
      this.context = await this.browser.newContext({ viewport: { width: 1440, height: 900 } });
    }

    const page = await this.context.newPage();
    this.page = page;

    if (!hasAuthState) {
      await loginInteractively(this.context, page, {
        loginUrl: this.config.loginUrl,
        authStatePath: this.config.authStatePath,
        prompt: this.prompt,
        logger: this.logger,
        signal,
        tickMs: this.config.timings.tickMs,
      });
    }

    this.logger.log(`[session] Navigating to ${targetUrl}`);
    await this.guard(() => page.goto(targetUrl, { waitUntil: 'domcontentloaded' }));
    await settle(this.config.initialLoadDelayMs, signal, this.config.timings.tickMs);
    await this.guard(() => this.waitForTable(page));
    this.logger.log('[session] Standings table found.');
  }

  async collect(signal: AbortSignal): Promise<StandingsRow[]> {
    return collectStandings(this, {
      settleMs: this.config.collector.scrollSettleMs,
      maxIterations: this.config.collector.maxScrollIterations,
      tickMs: this.config.timings.tickMs,
      signal,
      logger: this.logger,
    });
  }

  async reload(): Promise<void> {
    const page = this.requirePage();
    this.logger.log('[session] Reloading page...');
    await this.guard(async () => {
      await page.reload({ waitUntil: 'domcontentloaded' });
      await this.waitForTable(page);
    });
  }

  async readMountedMarkup(): Promise<string> {
    const page = this.requirePage();
    return this.guard(async () => {
      const table = page.locator(SELECTORS.standingsTable).first();
      if ((await table.count()) === 0) return page.content();
      return table.evaluate((el) => el.outerHTML);
    });
  }

  async scrollLastRowIntoView(rowSelector: string): Promise<void> {
    const page = this.requirePage();
    await this.guard(async () => {
      const rows = page.locator(rowSelector);
      if ((await rows.count()) === 0) return;
      await rows.last().scrollIntoViewIfNeeded();
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.release();
    }
    return this.closing;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async release(): Promise<void> {
    const { page, context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;

    const failures: string[] = [];
    const attempt = async (name: string, closeIt: () => Promise<void>) => {
      try {
        await closeIt();
      } catch (err: unknown) {
        failures.push(`${name}: ${errorMessage(err)}`);
      }
    };

    if (page) await attempt('page', () => page.close());
    if (context) await attempt('context', () => context.close());
    if (browser) await attempt('browser', () => browser.close());

    if (failures.length > 0) {
      this.logger.warn(`[session] Cleanup finished with errors (${failures.join('; ')})`);
    } else {
      this.logger.log('[session] Browser closed and resources cleaned up.');
    }
  }

  private async waitForTable(page: Page): Promise<void> {
    await page.waitForSelector(SELECTORS.standingsTable, {
      timeout: this.config.tableLoadTimeoutMs,
    });
  }

  private requirePage(): Page {
    if (!this.page || this.page.isClosed()) {
      throw new SessionFatal('Browser session is not open');
    }
    return this.page;
  }

  /** Map "target closed" failures to SessionFatal; everything else stays transient. */
  private async guard<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err: unknown) {
      if (CLOSED_TARGET.test(errorMessage(err)) || this.browser?.isConnected() === false) {
        throw new SessionFatal(`Browser session lost: ${errorMessage(err)}`);
      }
      throw err;
    }
  }
}
