import { Lead, LeadChanges, LeadStatus } from '../types/lead';
import { LeadStore } from '../types/store';
import { ScreeningConfig } from '../config/screening';
import { RegionalValidator, RegionClassification } from './regional.service';
import { ConversationHistoryBuilder } from './history.service';
import { ResponseGenerator } from './llm/response.generator';
import { buildSystemPrompt } from '../utils/prompts';
import { extractWhatsAppPhone, sanitizeText } from '../utils/validators';
import { errorMessage, PersistenceError, ScreeningError, ScreeningErrorCode } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ScreeningFailure {
  success: false;
  error: ScreeningErrorCode;
  message: string;
}

export interface ReceiveMessageSuccess {
  success: true;
  leadId: string;
  phone: string;
  reply: string;
  tokensTotal: number | null;
  latencyMs: number;
  costUsd: number | null;
  status: LeadStatus;
}

export interface EligibilitySuccess {
  success: true;
  leadId: string;
  isEligible: boolean;
  classification: RegionClassification;
  description: string;
  regionStatus: string;
}

export interface LeadSuccess {
  success: true;
  lead: Lead;
}

export type ReceiveMessageResult = ReceiveMessageSuccess | ScreeningFailure;
export type EligibilityResult = EligibilitySuccess | ScreeningFailure;
export type LeadResult = LeadSuccess | ScreeningFailure;

export type LeadProfileUpdate = Partial<
  Pick<Lead, 'name' | 'email' | 'region' | 'city' | 'interest' | 'availability' | 'preferredMeetingAt' | 'preferredTime'>
>;

interface StatusTransition {
  leadId: string;
  oldStatus: LeadStatus;
  newStatus: LeadStatus;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Owns the lead lifecycle. Every public method resolves to a result object;
 * failures are reported through `{ success: false, error }` and never thrown.
 *
 * Writes for one contact run inside store transactions that hold the
 * contact's lock. The language-model call happens between two such
 * transactions, with no lock held.
 */
export class LeadScreeningService {
  private validator: RegionalValidator;
  private history: ConversationHistoryBuilder;

  constructor(
    private store: LeadStore,
    private generator: ResponseGenerator,
    private config: ScreeningConfig,
    private now: () => Date = () => new Date()
  ) {
    this.validator = new RegionalValidator(config.regions);
    this.history = new ConversationHistoryBuilder(store, config.historyLimit);
  }

  async receiveMessage(contactKey: string, rawText: string): Promise<ReceiveMessageResult> {
    const phone = extractWhatsAppPhone(contactKey);
    if (!phone) {
      logger.warn('Rejected message from invalid contact', { contactKey });
      return this.fail('INVALID_CONTACT', `Invalid contact key: ${contactKey}`);
    }

    const text = sanitizeText(rawText, this.config.maxMessageLength);

    try {
      const receivedAt = this.now();
      const intake = await this.store.transaction(async (uow) => {
        await uow.lockContact(phone);

        let lead = await uow.findLeadByPhone(phone);
        const created = lead === null;
        if (!lead) {
          lead = await uow.createLead(phone, receivedAt);
        }

        const changes: LeadChanges = { lastInteractionAt: receivedAt };
        let transition: StatusTransition | null = null;
        if (lead.status === 'NEW') {
          changes.status = 'IN_SCREENING';
          transition = { leadId: lead.id, oldStatus: lead.status, newStatus: 'IN_SCREENING' };
        }

        return { lead: await uow.updateLead(lead.id, changes), created, transition };
      });

      const lead = intake.lead;
      if (intake.created) {
        logger.info('Lead created', { leadId: lead.id, phone });
      }
      if (intake.transition) {
        this.logTransition(intake.transition);
      }

      const history = await this.history.build(lead.id);
      const outcome = await this.generator.generate(buildSystemPrompt(this.config.systemPrompt, lead), history, text);

      if (!outcome.ok) {
        logger.error('Response generation failed', {
          leadId: lead.id,
          provider: this.generator.provider,
          kind: outcome.failure.kind,
          error: outcome.failure.message,
        });
        return this.fail('GENERATION_FAILED', outcome.failure.message);
      }

      const { reply } = outcome;
      const current = await this.store.transaction(async (uow) => {
        await uow.lockContact(phone);

        await uow.addConversation({
          leadId: lead.id,
          inboundText: text,
          outboundText: reply.text,
          tokensInput: reply.tokensInput ?? null,
          tokensOutput: reply.tokensOutput ?? null,
          tokensTotal: reply.tokensTotal ?? null,
          costCents: reply.costCents ?? null,
          latencyMs: reply.latencyMs,
        });

        const latest = await uow.findLeadById(lead.id);
        if (!latest) {
          throw new ScreeningError('LEAD_NOT_FOUND', `Lead ${lead.id} disappeared while processing a message`);
        }
        if (latest.status === 'AWAITING_RESPONSE') {
          return uow.updateLead(latest.id, { nextFollowUpAt: this.followUpDeadline() });
        }
        return latest;
      });

      logger.info('Message processed', {
        leadId: current.id,
        status: current.status,
        tokens: reply.tokensTotal,
        latencyMs: reply.latencyMs,
      });

      return {
        success: true,
        leadId: current.id,
        phone: current.phone,
        reply: reply.text,
        tokensTotal: reply.tokensTotal ?? null,
        latencyMs: reply.latencyMs,
        costUsd: reply.costUsd ?? null,
        status: current.status,
      };
    } catch (error) {
      return this.failure('receiveMessage', error);
    }
  }

  async validateEligibility(leadId: string): Promise<EligibilityResult> {
    try {
      const { lead, transition, classification } = await this.store.transaction(async (uow) => {
        const existing = await uow.findLeadById(leadId);
        if (!existing) {
          throw new ScreeningError('LEAD_NOT_FOUND', `Lead ${leadId} not found`);
        }
        if (!existing.region || !existing.region.trim()) {
          throw new ScreeningError('REGION_MISSING', `Lead ${leadId} has no region`);
        }

        const classification = this.validator.classify(existing.region);
        const eligible = classification === 'eligible';
        const newStatus: LeadStatus = eligible ? 'AWAITING_RESPONSE' : 'NOT_ELIGIBLE';
        const updated = await uow.updateLead(existing.id, { eligible, status: newStatus });

        return {
          lead: updated,
          classification,
          transition: { leadId: existing.id, oldStatus: existing.status, newStatus },
        };
      });

      this.logTransition(transition);

      const region = (lead.region ?? '').trim().toUpperCase();
      const isEligible = classification === 'eligible';

      return {
        success: true,
        leadId: lead.id,
        isEligible,
        classification,
        description: isEligible
          ? `Ótimo! A região ${region} é elegível para franquias.`
          : `A região ${region} ainda não está aberta para implantações, mas vamos registrar seu interesse para futuras expansões.`,
        regionStatus: this.validator.describe(region).description,
      };
    } catch (error) {
      return this.failure('validateEligibility', error);
    }
  }

  async markAwaitingResponse(leadId: string): Promise<LeadResult> {
    try {
      const { lead, transition } = await this.store.transaction(async (uow) => {
        const existing = await uow.findLeadById(leadId);
        if (!existing) {
          throw new ScreeningError('LEAD_NOT_FOUND', `Lead ${leadId} not found`);
        }

        const updated = await uow.updateLead(existing.id, {
          status: 'AWAITING_RESPONSE',
          nextFollowUpAt: this.followUpDeadline(),
        });
        return {
          lead: updated,
          transition: { leadId: existing.id, oldStatus: existing.status, newStatus: updated.status },
        };
      });

      this.logTransition(transition);
      return { success: true, lead };
    } catch (error) {
      return this.failure('markAwaitingResponse', error);
    }
  }

  async recordFollowUpAttempt(leadId: string): Promise<LeadResult> {
    try {
      const lead = await this.store.transaction(async (uow) => {
        const existing = await uow.findLeadById(leadId);
        if (!existing) {
          throw new ScreeningError('LEAD_NOT_FOUND', `Lead ${leadId} not found`);
        }
        return uow.updateLead(existing.id, {
          followUpAttempts: existing.followUpAttempts + 1,
          lastFollowUpAt: this.now(),
        });
      });

      logger.info('Follow-up attempt recorded', { leadId: lead.id, attempts: lead.followUpAttempts });
      return { success: true, lead };
    } catch (error) {
      return this.failure('recordFollowUpAttempt', error);
    }
  }

  /**
   * Applies profile fields collected outside the conversation. A changed
   * region clears the previous eligibility verdict.
   */
  async updateLeadProfile(leadId: string, profile: LeadProfileUpdate): Promise<LeadResult> {
    try {
      const lead = await this.store.transaction(async (uow) => {
        const existing = await uow.findLeadById(leadId);
        if (!existing) {
          throw new ScreeningError('LEAD_NOT_FOUND', `Lead ${leadId} not found`);
        }

        const changes: LeadChanges = { ...profile };
        if (profile.region !== undefined) {
          changes.region = profile.region === null ? null : profile.region.trim().toUpperCase();
          if (changes.region !== existing.region) {
            changes.eligible = null;
          }
        }
        return uow.updateLead(existing.id, changes);
      });

      logger.info('Lead profile updated', { leadId: lead.id, fields: Object.keys(profile) });
      return { success: true, lead };
    } catch (error) {
      return this.failure('updateLeadProfile', error);
    }
  }

  private followUpDeadline(): Date {
    return new Date(this.now().getTime() + this.config.followUpDelayHours * HOUR_MS);
  }

  private logTransition(transition: StatusTransition): void {
    logger.info('Lead status changed', {
      leadId: transition.leadId,
      oldStatus: transition.oldStatus,
      newStatus: transition.newStatus,
    });
  }

  private fail(error: ScreeningErrorCode, message: string): ScreeningFailure {
    return { success: false, error, message };
  }

  private failure(operation: string, error: unknown): ScreeningFailure {
    if (error instanceof ScreeningError) {
      logger.warn('Screening operation rejected', { operation, code: error.code, error: error.message });
      return this.fail(error.code, error.message);
    }
    if (error instanceof PersistenceError) {
      logger.error('Screening persistence failure', { operation, error: error.message });
      return this.fail('PERSISTENCE_ERROR', error.message);
    }
    logger.error('Unexpected screening failure', { operation, error: errorMessage(error) });
    return this.fail('UNEXPECTED_ERROR', errorMessage(error));
  }
}
