import { Worker, ConnectionOptions } from 'bullmq';
import { QUEUE_NAMES } from '../config/queue';
import { LeadStore } from '../types/store';
import { LeadScreeningService } from '../services/screening.service';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const FOLLOW_UP_BATCH_SIZE = 100;

export interface FollowUpSweepDeps {
  store: Pick<LeadStore, 'findLeadsDueForFollowUp'>;
  screening: Pick<LeadScreeningService, 'recordFollowUpAttempt'>;
  now?: () => Date;
  batchSize?: number;
}

export interface FollowUpSweepResult {
  due: number;
  recorded: number;
  failed: number;
}

/** Records one follow-up attempt for every lead whose deadline has passed. */
export async function processFollowUpSweep(deps: FollowUpSweepDeps): Promise<FollowUpSweepResult> {
  const now = deps.now ? deps.now() : new Date();
  const leads = await deps.store.findLeadsDueForFollowUp(now, deps.batchSize ?? FOLLOW_UP_BATCH_SIZE);

  let recorded = 0;
  let failed = 0;

  for (const lead of leads) {
    const result = await deps.screening.recordFollowUpAttempt(lead.id);
    if (result.success) {
      recorded++;
    } else {
      failed++;
      logger.warn('Follow-up attempt not recorded', { leadId: lead.id, error: result.error, message: result.message });
    }
  }

  logger.info('Follow-up sweep completed', { due: leads.length, recorded, failed });
  return { due: leads.length, recorded, failed };
}

export function startFollowUpWorker(connection: ConnectionOptions, deps: FollowUpSweepDeps): Worker {
  const worker = new Worker(
    QUEUE_NAMES.FOLLOW_UP_SWEEP,
    async (job) => {
      logger.info('Follow-up sweep started', { jobId: job.id });
      return processFollowUpSweep(deps);
    },
    {
      connection,
      concurrency: 1,
    }
  );

  worker.on('failed', (job, err) => {
    logger.error('Follow-up sweep failed', { jobId: job?.id, error: errorMessage(err) });
  });

  return worker;
}
