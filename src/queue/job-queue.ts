/**
 * Durable FIFO list the external workers pop from. This service only
 * produces; the consumer side is out of scope beyond the message shape.
 */
export interface JobQueue {
  push(message: string): Promise<void>;
  close(): Promise<void>;
}
