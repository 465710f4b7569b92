/**
 * @fileoverview Job queue factory.
 *
 * Returns the queue selected by JOB_QUEUE_PROVIDER:
 * - 'bullmq': Redis-backed (default, for dev and production)
 * - 'memory': in-process (tests, or running the scheduler without Redis)
 */

import type { Redis } from 'ioredis';
import type { JobQueueProvider } from '../../config.js';
import { BullMqJobQueue, createRedisConnection } from './bullmq.js';
import { MemoryJobQueue } from './memory.js';
import type { JobQueue } from './types.js';
import { EMAIL_PROCESSING_QUEUE } from './types.js';

export * from './types.js';
export { BullMqJobQueue, createRedisConnection } from './bullmq.js';
export { MemoryJobQueue } from './memory.js';

export interface JobQueueHandle {
  queue: JobQueue;
  /** Closes the queue and any connection opened for it. */
  close(): Promise<void>;
}

export function createJobQueue(provider: JobQueueProvider, redisUrl: string): JobQueueHandle {
  switch (provider) {
    case 'memory': {
      const queue = new MemoryJobQueue(EMAIL_PROCESSING_QUEUE);
      return { queue, close: () => queue.close() };
    }
    case 'bullmq': {
      const connection: Redis = createRedisConnection(redisUrl);
      const queue = new BullMqJobQueue(connection, EMAIL_PROCESSING_QUEUE);
      return {
        queue,
        close: async () => {
          await queue.close();
          await connection.quit();
        },
      };
    }
  }
}
