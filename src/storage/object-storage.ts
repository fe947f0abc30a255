/**
 * Object storage contract.
 *
 * Keys follow the artifact layout in domain/artifact. Implementations raise
 * ServiceError with a STORAGE.* code for transport failures and return null
 * for a key that does not exist.
 */

import { Readable } from 'stream';

export interface StoredObject {
  /** Chunked body; never buffered whole. */
  body: Readable;
  contentType?: string;
  contentLength?: number;
}

export interface ObjectStorage {
  /** Names of every object under `prefix`, relative to it. One logical call. */
  list(prefix: string): Promise<string[]>;
  getObject(key: string): Promise<StoredObject | null>;
  /** Upload a local file, streaming it from disk. */
  putFile(key: string, filePath: string, contentType: string): Promise<void>;
}
