/**
 * Delivery Layer.
 *
 * Opens stored artifacts as chunked streams. Thumbnails are derived on the
 * first request: the original is copied to a temp directory, one frame is
 * extracted, the image is uploaded and the stored copy is streamed. Later
 * requests read the stored thumbnail. Concurrent first requests for the same
 * thumbnail share a single derivation.
 */

import path from 'path';
import { createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import { ObjectStorage, StoredObject } from '../storage/object-storage';
import { withTempDir } from '../storage/temp-dir';
import { ArtifactKind, CONTENT_TYPES, artifactKey } from '../domain/artifact';
import { ServiceError, notFoundError, thumbnailDerivationError } from '../domain/errors';
import { FrameExtractor } from './frame-extractor';
import { Logger, logger as rootLogger, errorContext } from '../logger';

export interface ArtifactStream {
  key: string;
  body: StoredObject['body'];
  contentType: string;
  contentLength?: number;
}

export class DeliveryService {
  private derivations = new Map<string, Promise<void>>();
  private log: Logger;

  constructor(
    private storage: ObjectStorage,
    private frameExtractor: FrameExtractor,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'delivery' });
  }

  /** Open an artifact. Missing videos are NotFound; missing thumbnails are derived. */
  async openStream(userId: string, taskId: string, kind: ArtifactKind): Promise<ArtifactStream> {
    const key = artifactKey(userId, taskId, kind);
    const stored = await this.storage.getObject(key);
    if (stored) {
      return this.toStream(key, kind, stored);
    }
    if (kind !== 'thumbnail') {
      throw new ServiceError(notFoundError('Artifact', key));
    }

    await this.deriveThumbnail(userId, taskId);
    const derived = await this.storage.getObject(key);
    if (!derived) {
      throw new ServiceError(thumbnailDerivationError(taskId, 'thumbnail missing after upload'));
    }
    return this.toStream(key, kind, derived);
  }

  private toStream(key: string, kind: ArtifactKind, stored: StoredObject): ArtifactStream {
    return {
      key,
      body: stored.body,
      contentType: CONTENT_TYPES[kind],
      contentLength: stored.contentLength,
    };
  }

  private deriveThumbnail(userId: string, taskId: string): Promise<void> {
    const thumbKey = artifactKey(userId, taskId, 'thumbnail');
    const inFlight = this.derivations.get(thumbKey);
    if (inFlight) return inFlight;

    const derivation = this.runDerivation(userId, taskId, thumbKey).finally(() => {
      this.derivations.delete(thumbKey);
    });
    this.derivations.set(thumbKey, derivation);
    return derivation;
  }

  private async runDerivation(userId: string, taskId: string, thumbKey: string): Promise<void> {
    const originalKey = artifactKey(userId, taskId, 'original');
    const original = await this.storage.getObject(originalKey);
    if (!original) {
      throw new ServiceError(notFoundError('Artifact', originalKey));
    }

    const log = this.log.child({ taskId, userId });
    try {
      await withTempDir('thumb', async (dir) => {
        const videoPath = path.join(dir, 'source.mp4');
        const imagePath = path.join(dir, 'thumb.jpg');
        await pipeline(original.body, createWriteStream(videoPath));
        await this.frameExtractor.extractFrame(videoPath, imagePath);
        await this.storage.putFile(thumbKey, imagePath, CONTENT_TYPES.thumbnail);
      });
    } catch (err) {
      // Unread when the temp directory could not be created.
      original.body.destroy();
      log.error('Thumbnail derivation failed', errorContext(err));
      const reason = err instanceof Error ? err.message : String(err);
      throw new ServiceError(thumbnailDerivationError(taskId, reason), { cause: err });
    }
    log.info('Thumbnail derived', { key: thumbKey });
  }
}
