/**
 * S3-compatible object storage (MinIO or AWS).
 *
 * Listing pages through ListObjectsV2 under the user prefix; uploads go
 * through the multipart `Upload` helper so large videos stream from disk.
 */

import { Readable } from 'stream';
import { createReadStream } from 'fs';
import {
  GetObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  NoSuchKey,
  S3Client,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { ServiceError, storageError } from '../domain/errors';
import { StorageConfig } from '../config';
import { ObjectStorage, StoredObject } from './object-storage';

const PART_SIZE = 8 * 1024 * 1024;
const QUEUE_SIZE = 4;

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
  });
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown storage error';
}

function isMissingKey(err: unknown): boolean {
  return err instanceof NoSuchKey || (err instanceof Error && err.name === 'NoSuchKey');
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(private client: S3Client, private bucket: string) {}

  async list(prefix: string): Promise<string[]> {
    const names: string[] = [];
    let continuationToken: string | undefined;

    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        );
      } catch (err) {
        throw new ServiceError(storageError('list', prefix, messageOf(err)), { cause: err });
      }

      for (const object of page.Contents ?? []) {
        if (object.Key) {
          names.push(object.Key.slice(prefix.length));
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return names;
  }

  async getObject(key: string): Promise<StoredObject | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!(response.Body instanceof Readable)) {
        throw new Error('response body is not a Node stream');
      }
      return {
        body: response.Body,
        contentType: response.ContentType,
        contentLength: response.ContentLength,
      };
    } catch (err) {
      if (isMissingKey(err)) return null;
      throw new ServiceError(storageError('get', key, messageOf(err)), { cause: err });
    }
  }

  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(filePath),
        ContentType: contentType,
      },
      partSize: PART_SIZE,
      queueSize: QUEUE_SIZE,
    });

    try {
      await upload.done();
    } catch (err) {
      throw new ServiceError(storageError('upload', key, messageOf(err)), { cause: err });
    }
  }
}
