/**
 * Init Auth (Manual, Headed)
 *
 * Opens a visible browser on the site root, waits for the user to log in by
 * hand, then saves the browser state so later runs skip the login entirely.
 *
 * The scheduler falls back to the same flow on its first run when no saved
 * state exists; this command only lets it be done ahead of time.
 */

import dotenv from 'dotenv';
import { chromium, BrowserContext, Page } from 'playwright';
import path from 'path';
import fs from 'fs';
import readline from 'readline/promises';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { CANCEL_TICK_MS } from './selectors';
import { Logger, settle } from './scrape/helpers';

/** Resolves once the user confirms the login is complete. */
export type LoginPrompt = (page: Page, signal?: AbortSignal) => Promise<void>;

export const promptForLogin: LoginPrompt = async (_page, signal) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log('Please log in to your account in the browser window.');
    await rl.question('Once you are logged in, press Enter in this console to continue...', { signal });
  } finally {
    rl.close();
  }
};

/**
 * Blocking interactive login on `context`, then persist its storage state.
 */
export async function loginInteractively(
  context: BrowserContext,
  page: Page,
  opts: {
    loginUrl: string;
    authStatePath: string;
    prompt?: LoginPrompt;
    logger?: Logger;
    signal?: AbortSignal;
    tickMs?: number;
  }
): Promise<void> {
  const logger = opts.logger ?? console;
  const prompt = opts.prompt ?? promptForLogin;

  await page.goto(opts.loginUrl, { waitUntil: 'domcontentloaded' });
  await prompt(page, opts.signal);

  // Small extra wait so all cookies / tokens finish writing
  await settle(2000, opts.signal, opts.tickMs ?? CANCEL_TICK_MS);

  fs.mkdirSync(path.dirname(opts.authStatePath), { recursive: true });
  await context.storageState({ path: opts.authStatePath });
  logger.log(`[session] Authentication state saved to ${opts.authStatePath}`);
}

export async function initAuth(): Promise<void> {
  const config = loadConfig(process.env, process.argv.slice(2));

  console.log('=== Standings Auth Init ===');
  console.log(`Target:  ${config.loginUrl}`);
  console.log(`Output:  ${config.authStatePath}`);
  console.log('');

  const browser = await chromium.launch({ headless: false });
  try {
    const context = await browser.newContext({ viewport: { width: 1280, height: 900 } });
    const page = await context.newPage();
    await loginInteractively(context, page, {
      loginUrl: config.loginUrl,
      authStatePath: config.authStatePath,
    });
    console.log('');
    console.log('Auth initialized successfully');
  } catch (err: unknown) {
    console.error('');
    console.error(`Auth init failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    await browser.close();
  }
}

// ---------------------------------------------------------------------------
// Direct CLI execution
// ---------------------------------------------------------------------------

if (require.main === module) {
  dotenv.config();
  initAuth().catch((err: unknown) => {
    console.error(`Auth init failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
