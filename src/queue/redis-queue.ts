/**
 * Redis list-backed job queue.
 *
 * Messages are LPUSHed; workers BRPOP from the other end, which keeps the
 * list first-in first-out.
 */

import { Redis } from 'ioredis';
import { JobQueue } from './job-queue';
import { logger, errorContext } from '../logger';

const log = logger.child({ module: 'redis-queue' });

export class RedisJobQueue implements JobQueue {
  constructor(private client: Redis, private queueName: string) {
    client.on('error', (err: Error) => {
      log.error('Redis connection error', { queue: queueName, ...errorContext(err) });
    });
  }

  static fromUrl(redisUrl: string, queueName: string): RedisJobQueue {
    const client = new Redis(redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      connectTimeout: 5_000,
    });
    return new RedisJobQueue(client, queueName);
  }

  async push(message: string): Promise<void> {
    await this.client.lpush(this.queueName, message);
  }

  async close(): Promise<void> {
    if (this.client.status === 'end') return;
    await this.client.quit();
  }
}
