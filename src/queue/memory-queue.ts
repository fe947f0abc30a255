/**
 * In-memory job queue for development and tests. Mirrors LPUSH ordering:
 * the newest message is at index 0.
 */

import { JobQueue } from './job-queue';

export class MemoryJobQueue implements JobQueue {
  private items: string[] = [];

  async push(message: string): Promise<void> {
    this.items.unshift(message);
  }

  async close(): Promise<void> {
    this.items = [];
  }

  /** Messages in push order, oldest first. */
  messages(): string[] {
    return [...this.items].reverse();
  }

  get length(): number {
    return this.items.length;
  }
}
