import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { LeadScreeningService, ScreeningFailure } from '../services/screening.service';
import { RegionalValidator } from '../services/regional.service';
import { ReportingStore } from '../types/store';
import { isLeadStatus, isPast, isUpcoming } from '../types/lead';
import { apiKeyAuth } from '../middleware/auth';
import { httpStatusFor } from '../utils/errors';
import { isBusinessHoursTime } from '../utils/validators';

export interface HealthStatus {
  status: string;
  error?: string;
}

export interface AdminDeps {
  screening: LeadScreeningService;
  reporting: ReportingStore;
  regions: RegionalValidator;
  health: {
    database: () => Promise<HealthStatus>;
    redis: () => Promise<HealthStatus>;
  };
  apiKeys: string;
  costLimitMonthlyUsd: number;
  now?: () => Date;
}

const listLeadsQuerySchema = z.object({
  status: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export function leadProfileSchema(now: () => Date = () => new Date()) {
  const optionalText = z.string().trim().min(1).max(255).nullable().optional();

  return z
    .object({
      name: optionalText,
      email: z.string().trim().email().max(255).nullable().optional(),
      region: z
        .string()
        .trim()
        .regex(/^[A-Za-z]{2}$/, 'region must be a 2-letter state code')
        .transform((value) => value.toUpperCase())
        .nullable()
        .optional(),
      city: optionalText,
      interest: z.string().trim().min(1).max(2000).nullable().optional(),
      availability: z.string().trim().min(1).max(2000).nullable().optional(),
      preferredMeetingAt: z.coerce
        .date()
        .refine((date) => date.getTime() > now().getTime(), 'preferredMeetingAt must be in the future')
        .nullable()
        .optional(),
      preferredTime: z
        .string()
        .refine((time) => isBusinessHoursTime(time), 'preferredTime must be HH:MM between 09:00 and 18:00')
        .nullable()
        .optional(),
    })
    .strict();
}

function sendFailure(res: Response, failure: ScreeningFailure) {
  res.status(httpStatusFor(failure.error)).json(failure);
}

export function createAdminRouter(deps: AdminDeps): Router {
  const router = Router();
  const now = deps.now ?? (() => new Date());
  const profileSchema = leadProfileSchema(now);

  router.get('/health', async (_req: Request, res: Response) => {
    const [database, redis] = await Promise.all([deps.health.database(), deps.health.redis()]);
    const healthy = database.status === 'healthy' && redis.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      database,
      redis,
      timestamp: now().toISOString(),
    });
  });

  router.use(apiKeyAuth(deps.apiKeys));

  router.get('/usage', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await deps.reporting.getUsageStats(now());
      const spentUsd = stats.conversations.totalCostCents / 100;

      res.json({
        success: true,
        usage: {
          ...stats,
          conversations: { ...stats.conversations, totalCostUsd: spentUsd },
          costLimit: {
            monthlyUsd: deps.costLimitMonthlyUsd,
            spentUsd,
            exceeded: spentUsd >= deps.costLimitMonthlyUsd,
          },
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/leads', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = listLeadsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: 'Invalid query', details: parsed.error.flatten() });
        return;
      }

      const { limit, offset } = parsed.data;
      const status = parsed.data.status?.trim().toUpperCase();
      if (status !== undefined && !isLeadStatus(status)) {
        res.status(400).json({ success: false, error: `Unknown status: ${parsed.data.status}` });
        return;
      }

      const { total, leads } = await deps.reporting.listLeads({ status, limit, offset });
      res.json({ success: true, total, limit, offset, leads });
    } catch (error) {
      next(error);
    }
  });

  router.get('/leads/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const lead = await deps.reporting.getLead(req.params.id);
      if (!lead) {
        res.status(404).json({ success: false, error: 'LEAD_NOT_FOUND', message: `Lead ${req.params.id} not found` });
        return;
      }

      const [conversations, schedulings] = await Promise.all([
        deps.reporting.getConversations(lead.id),
        deps.reporting.getSchedulings(lead.id),
      ]);
      const at = now();

      res.json({
        success: true,
        lead,
        conversations,
        schedulings: schedulings.map((scheduling) => ({
          ...scheduling,
          isUpcoming: isUpcoming(scheduling, at),
          isPast: isPast(scheduling, at),
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/leads/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = profileSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: 'Invalid profile', details: parsed.error.flatten() });
        return;
      }

      const result = await deps.screening.updateLeadProfile(req.params.id, parsed.data);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/leads/:id/eligibility', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await deps.screening.validateEligibility(req.params.id);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/leads/:id/awaiting-response', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await deps.screening.markAwaitingResponse(req.params.id);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/regions', (_req: Request, res: Response) => {
    res.json({
      success: true,
      eligible: deps.regions.listEligible(),
      interest: deps.regions.listInterest(),
    });
  });

  return router;
}
