import { Router, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { LeadScreeningService } from '../services/screening.service';
import { MessageDedupeService } from '../services/dedupe.service';
import { WhatsAppSender } from '../services/whatsapp/whatsapp.adapter';
import { webhookAuth } from '../middleware/auth';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const evolutionMessageSchema = z.object({
  key: z.object({
    remoteJid: z.string().min(1),
    fromMe: z.boolean().default(false),
    id: z.string().min(1),
  }),
  message: z
    .object({
      conversation: z.string().optional(),
      extendedTextMessage: z.object({ text: z.string() }).optional(),
    })
    .nullish(),
});

const flatMessageSchema = z.object({
  remoteJid: z.string().min(1),
  fromMe: z.boolean().default(false),
  id: z.string().min(1),
  conversation: z.string().optional(),
});

export const webhookPayloadSchema = z.object({
  event: z.string(),
  data: z.object({
    instanceId: z.string().optional(),
    messages: z.array(z.union([evolutionMessageSchema, flatMessageSchema])),
  }),
});

type PayloadMessage = z.infer<typeof webhookPayloadSchema>['data']['messages'][number];

export interface InboundWhatsAppMessage {
  id: string;
  remoteJid: string;
  fromMe: boolean;
  text: string | null;
}

export function normalizeMessage(message: PayloadMessage): InboundWhatsAppMessage {
  if ('key' in message) {
    return {
      id: message.key.id,
      remoteJid: message.key.remoteJid,
      fromMe: message.key.fromMe,
      text: message.message?.conversation ?? message.message?.extendedTextMessage?.text ?? null,
    };
  }
  return {
    id: message.id,
    remoteJid: message.remoteJid,
    fromMe: message.fromMe,
    text: message.conversation ?? null,
  };
}

// Evolution emits both "messages.upsert" and "MESSAGES_UPSERT" depending on version.
function isMessageUpsert(event: string): boolean {
  return event.toLowerCase().replace(/_/g, '.') === 'messages.upsert';
}

function firstRemoteJid(body: unknown): string | null {
  const parsed = webhookPayloadSchema.safeParse(body);
  if (!parsed.success || parsed.data.data.messages.length === 0) return null;
  return normalizeMessage(parsed.data.data.messages[0]).remoteJid;
}

export interface WebhookDeps {
  screening: LeadScreeningService;
  dedupe: MessageDedupeService;
  sender: WhatsAppSender | null;
  webhookSecret: string;
  perPhoneLimit: number;
}

export function createWebhookRouter(deps: WebhookDeps): Router {
  const router = Router();

  const perPhoneLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: deps.perPhoneLimit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => firstRemoteJid(req.body) ?? req.ip ?? 'unknown',
    message: { success: false, error: 'Too many messages from this contact' },
  });

  // Evolution pings the URL when the webhook is registered
  router.get('/evolution', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.post(
    '/evolution',
    webhookAuth(deps.webhookSecret),
    perPhoneLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const parsed = webhookPayloadSchema.safeParse(req.body);
        if (!parsed.success) {
          logger.warn('Invalid webhook payload', { issues: parsed.error.issues.length });
          res.status(400).json({ success: false, error: 'Invalid payload', details: parsed.error.flatten() });
          return;
        }

        const { event, data } = parsed.data;
        if (!isMessageUpsert(event)) {
          logger.debug('Ignoring webhook event', { event });
          res.json({ status: 'ok' });
          return;
        }

        let processed = 0;
        let skipped = 0;
        let failed = 0;

        for (const message of data.messages.map(normalizeMessage)) {
          if (message.fromMe || !message.text) {
            skipped++;
            continue;
          }

          if (!(await deps.dedupe.claim(message.id))) {
            logger.info('Duplicate webhook message skipped', { messageId: message.id });
            skipped++;
            continue;
          }

          const result = await deps.screening.receiveMessage(message.remoteJid, message.text);
          if (!result.success) {
            logger.warn('Inbound message not processed', {
              messageId: message.id,
              error: result.error,
              message: result.message,
            });
            failed++;
            continue;
          }

          processed++;

          if (deps.sender) {
            try {
              await deps.sender.sendText(result.phone, result.reply);
            } catch (error) {
              logger.error('Failed to deliver WhatsApp reply', { leadId: result.leadId, error: errorMessage(error) });
            }
          }
        }

        res.json({ status: 'ok', processed, skipped, failed });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
