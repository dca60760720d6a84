import { Conversation, Lead, LeadChanges, LeadStatus, NewConversation, Scheduling } from './lead';

/**
 * Operations available inside one transaction. Row reads lock the row until
 * the transaction ends.
 */
export interface LeadUnitOfWork {
  /** Serializes work on one contact until the transaction ends. */
  lockContact(phone: string): Promise<void>;
  findLeadByPhone(phone: string): Promise<Lead | null>;
  findLeadById(leadId: string): Promise<Lead | null>;
  createLead(phone: string, firstContactAt: Date): Promise<Lead>;
  updateLead(leadId: string, changes: LeadChanges): Promise<Lead>;
  addConversation(conversation: NewConversation): Promise<Conversation>;
}

export interface LeadStore {
  transaction<T>(work: (uow: LeadUnitOfWork) => Promise<T>): Promise<T>;
  /** Most recent `limit` rows for the lead, returned oldest first. */
  getRecentConversations(leadId: string, limit: number): Promise<Conversation[]>;
  findLeadsDueForFollowUp(now: Date, limit: number): Promise<Lead[]>;
}

export interface LeadListFilter {
  status?: LeadStatus;
  limit: number;
  offset: number;
}

export interface UsageStats {
  leads: {
    total: number;
    new24h: number;
    byStatus: Partial<Record<LeadStatus, number>>;
  };
  conversations: {
    total: number;
    totalTokens: number;
    totalCostCents: number;
    averageLatencyMs: number;
  };
  schedulings: {
    total: number;
    upcoming: number;
  };
}

/** Read-only queries behind the admin reporting routes. */
export interface ReportingStore {
  getLead(leadId: string): Promise<Lead | null>;
  listLeads(filter: LeadListFilter): Promise<{ total: number; leads: Lead[] }>;
  getConversations(leadId: string): Promise<Conversation[]>;
  getSchedulings(leadId: string): Promise<Scheduling[]>;
  getUsageStats(now: Date): Promise<UsageStats>;
}
