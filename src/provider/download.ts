/**
 * Result asset download.
 *
 * Streams the provider's result URL straight to a local file so a large
 * video is never held in memory. The whole transfer runs under one timeout.
 */

import { createWriteStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ServiceError, isServiceError, providerError, providerTimeoutError } from '../domain/errors';
import { FetchFn } from './client';

export interface DownloadOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/** Download `url` into `destPath`. Resolves with the number of bytes written. */
export async function downloadAsset(url: string, destPath: string, options: DownloadOptions): Promise<number> {
  const fetchFn: FetchFn = options.fetchFn ?? ((target, init) => fetch(target, init));
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchFn(url, { method: 'GET', signal: controller.signal });
    if (!response.ok) {
      throw new ServiceError(providerError(`Asset download returned HTTP ${response.status}`, response.status));
    }
    if (!response.body) {
      throw new ServiceError(providerError('Asset download returned an empty body'));
    }

    await pipeline(Readable.fromWeb(response.body), createWriteStream(destPath));
    const { size } = await stat(destPath);
    return size;
  } catch (err) {
    if (isServiceError(err)) throw err;
    if (controller.signal.aborted) {
      throw new ServiceError(providerTimeoutError(options.timeoutMs), { cause: err });
    }
    const reason = err instanceof Error ? err.message : 'network error';
    throw new ServiceError(providerError(`Asset download failed: ${reason}`), { cause: err });
  } finally {
    clearTimeout(timeout);
  }
}
