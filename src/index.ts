import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { pool, checkDatabaseHealth } from './config/database';
import { redis, connectRedis, checkRedisHealth } from './config/redis';
import { createFollowUpQueue, parseRedisConnection, scheduleFollowUpSweep } from './config/queue';
import { loadScreeningConfig } from './config/screening';
import { createApp } from './app';
import { DatabaseService } from './services/database.service';
import { LeadScreeningService } from './services/screening.service';
import { RegionalValidator } from './services/regional.service';
import { MessageDedupeService } from './services/dedupe.service';
import { LLMFactory } from './services/llm/llm.factory';
import { createWhatsAppSender } from './services/whatsapp/evolution.adapter';
import { startFollowUpWorker } from './workers/followup.worker';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start() {
  const config = loadScreeningConfig(env);
  const store = new DatabaseService();
  const generator = LLMFactory.create(env);
  const screening = new LeadScreeningService(store, generator, config);

  await connectRedis();

  const app = createApp({
    screening,
    reporting: store,
    regions: new RegionalValidator(config.regions),
    dedupe: new MessageDedupeService(
      { set: (key, value, options) => redis.set(key, value, options) },
      env.WEBHOOK_DEDUPE_TTL_SECONDS
    ),
    sender: createWhatsAppSender(env),
    health: { database: checkDatabaseHealth, redis: checkRedisHealth },
  });

  const closers: Array<() => Promise<unknown>> = [];

  if (env.SCHEDULER_ENABLED) {
    const connection = parseRedisConnection(env.REDIS_URL);
    const queue = createFollowUpQueue(connection);
    const worker = startFollowUpWorker(connection, { store, screening });
    await scheduleFollowUpSweep(queue, env.SCHEDULER_INTERVAL_MINUTES);
    closers.push(() => worker.close(), () => queue.close());
  }

  const server = app.listen(parseInt(env.PORT, 10), () => {
    logger.info(`Server running on port ${env.PORT}`, {
      env: env.NODE_ENV,
      provider: generator.provider,
      scheduler: env.SCHEDULER_ENABLED,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    Promise.all(closers.map((close) => close()))
      .then(() => Promise.all([pool.end(), redis.quit()]))
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
