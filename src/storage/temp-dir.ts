/**
 * Scoped temporary directories.
 *
 * The directory exists only for the duration of `fn` and is removed on every
 * exit path, including a thrown error.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { logger, errorContext } from '../logger';

export async function withTempDir<T>(label: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), `reelgen-${label}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      logger.warn('Temp directory cleanup failed', { dir, ...errorContext(err) });
    });
  }
}
