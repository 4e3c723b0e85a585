/**
 * Lock file: one scheduler (and so one browser session) per workspace.
 */

import fs from 'fs';
import path from 'path';

export const LOCK_PATH = path.resolve('./automation/.scheduler.lock');

export function acquireLock(lockPath: string = LOCK_PATH): boolean {
  try {
    // wx: fails if the file already exists
    fs.writeFileSync(lockPath, String(process.pid), { flag: 'wx' });
    return true;
  } catch {
    return false;
  }
}

export function releaseLock(lockPath: string = LOCK_PATH): void {
  try {
    fs.unlinkSync(lockPath);
  } catch (err: unknown) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }
}
