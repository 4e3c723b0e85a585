import fs from 'fs';
import { test, expect } from '@playwright/test';
import { acquireLock, releaseLock } from '../automation/lock';

test.describe('scheduler lock', () => {
  test('only one holder at a time', () => {
    const lockPath = test.info().outputPath('scheduler.lock');
    fs.mkdirSync(test.info().outputDir, { recursive: true });

    expect(acquireLock(lockPath)).toBe(true);
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(String(process.pid));
    expect(acquireLock(lockPath)).toBe(false);

    releaseLock(lockPath);
    expect(fs.existsSync(lockPath)).toBe(false);
    expect(acquireLock(lockPath)).toBe(true);
    releaseLock(lockPath);
  });

  test('releasing a lock that is already gone is a no-op', () => {
    expect(() => releaseLock(test.info().outputPath('never-taken.lock'))).not.toThrow();
  });
});
