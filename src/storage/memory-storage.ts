/**
 * In-memory object storage.
 *
 * Reference implementation for development and tests. Bodies are served in
 * fixed-size chunks so consumers exercise the same streaming path as S3.
 */

import { Readable } from 'stream';
import { readFile } from 'fs/promises';
import { ObjectStorage, StoredObject } from './object-storage';

const CHUNK_SIZE = 64 * 1024;

interface MemoryObject {
  data: Buffer;
  contentType: string;
}

export class MemoryObjectStorage implements ObjectStorage {
  private objects = new Map<string, MemoryObject>();

  async list(prefix: string): Promise<string[]> {
    const names: string[] = [];
    for (const key of this.objects.keys()) {
      if (key.startsWith(prefix)) {
        names.push(key.slice(prefix.length));
      }
    }
    return names.sort();
  }

  async getObject(key: string): Promise<StoredObject | null> {
    const object = this.objects.get(key);
    if (!object) return null;
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < object.data.length; offset += CHUNK_SIZE) {
      chunks.push(object.data.subarray(offset, offset + CHUNK_SIZE));
    }
    return {
      body: Readable.from(chunks),
      contentType: object.contentType,
      contentLength: object.data.length,
    };
  }

  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    const data = await readFile(filePath);
    this.putObject(key, data, contentType);
  }

  /** Write bytes directly; stands in for the external workers in tests. */
  putObject(key: string, data: Buffer | string, contentType = 'application/octet-stream'): void {
    this.objects.set(key, {
      data: typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data),
      contentType,
    });
  }

  has(key: string): boolean {
    return this.objects.has(key);
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
