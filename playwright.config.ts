import { defineConfig } from '@playwright/test';

/**
 * Unit and integration tests. Nothing here launches a browser: the collector
 * and scheduler run against in-process fakes, the server on an ephemeral port.
 *
 * Usage:
 *   npx playwright test
 *   npx playwright test tests/projection.spec.ts
 */
export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
  timeout: 30_000,
  expect: {
    timeout: 5_000,
  },
});
