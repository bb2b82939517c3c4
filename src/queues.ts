import { Queue, type JobsOptions } from 'bullmq';
import { Redis } from 'ioredis';

const defaultJobOptions: JobsOptions = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 500 },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 1000 },
};

export const QUEUE_NAMES = {
  ALERT_READY: 'alert.ready',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

/** BullMQ queues sharing one connection; `close` releases both. */
export function createQueues(redisUrl: string) {
  const connection = new Redis(redisUrl, { maxRetriesPerRequest: null });
  const nameToQueue = new Map<string, Queue>();
  return {
    get(name: QueueName): Queue {
      let q = nameToQueue.get(name);
      if (!q) {
        q = new Queue(name, { connection, defaultJobOptions });
        nameToQueue.set(name, q);
      }
      return q;
    },
    async close(): Promise<void> {
      await Promise.all([...nameToQueue.values()].map(q => q.close()));
      await connection.quit();
    },
  };
}
