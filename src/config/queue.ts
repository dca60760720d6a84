import { Queue, ConnectionOptions } from 'bullmq';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  FOLLOW_UP_SWEEP: 'followup-sweep',
} as const;

export const FOLLOW_UP_SWEEP_JOB_ID = 'followup-sweep';

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.replace('/', '');

  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db ? parseInt(db, 10) : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    // required by BullMQ workers
    maxRetriesPerRequest: null,
  };
}

export function createFollowUpQueue(connection: ConnectionOptions): Queue {
  return new Queue(QUEUE_NAMES.FOLLOW_UP_SWEEP, { connection });
}

export async function scheduleFollowUpSweep(queue: Queue, intervalMinutes: number): Promise<void> {
  await queue.add(
    'sweep',
    {},
    {
      repeat: { every: intervalMinutes * 60 * 1000 },
      jobId: FOLLOW_UP_SWEEP_JOB_ID,
      removeOnComplete: 100,
      removeOnFail: 500,
    }
  );
  logger.info('Follow-up sweep scheduled', { intervalMinutes });
}
