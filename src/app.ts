import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env, parseList } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { createWebhookRouter } from './routes/webhook.routes';
import { createAdminRouter, AdminDeps } from './routes/admin.routes';
import { MessageDedupeService } from './services/dedupe.service';
import { WhatsAppSender } from './services/whatsapp/whatsapp.adapter';

export interface AppDeps extends Omit<AdminDeps, 'apiKeys' | 'costLimitMonthlyUsd'> {
  dedupe: MessageDedupeService;
  sender: WhatsAppSender | null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  const origins = parseList(env.CORS_ORIGINS);
  app.use(cors({ origin: origins.includes('*') ? '*' : origins }));
  app.use(express.json({ limit: '1mb' }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: env.RATE_LIMIT_GLOBAL,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  app.use(
    '/api/webhooks',
    createWebhookRouter({
      screening: deps.screening,
      dedupe: deps.dedupe,
      sender: deps.sender,
      webhookSecret: env.WEBHOOK_SECRET,
      perPhoneLimit: env.RATE_LIMIT_PER_PHONE,
    })
  );
  app.use(
    '/api/admin',
    createAdminRouter({
      ...deps,
      apiKeys: env.API_KEYS,
      costLimitMonthlyUsd: env.LLM_COST_LIMIT_MONTHLY,
    })
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
