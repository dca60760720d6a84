import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { query, withTransaction } from '../config/database';
import { Conversation, Lead, LeadChanges, LeadStatus, NewConversation, Scheduling } from '../types/lead';
import { LeadListFilter, LeadStore, LeadUnitOfWork, ReportingStore, UsageStats } from '../types/store';
import {
  leadStatusFromStorage,
  leadStatusToStorage,
  schedulingStatusFromStorage,
  schedulingStatusToStorage,
} from '../utils/statusMapping';
import { AppError, PersistenceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

interface LeadRow {
  id: string;
  phone: string;
  name: string | null;
  email: string | null;
  region: string | null;
  city: string | null;
  interest: string | null;
  availability: string | null;
  status: string;
  eligible: boolean | null;
  follow_up_attempts: number;
  last_follow_up_at: Date | null;
  next_follow_up_at: Date | null;
  preferred_meeting_at: Date | null;
  preferred_time: string | null;
  first_contact_at: Date;
  last_interaction_at: Date;
  created_at: Date;
  updated_at: Date;
}

interface ConversationRow {
  id: string;
  lead_id: string;
  inbound_text: string;
  outbound_text: string;
  tokens_input: number | null;
  tokens_output: number | null;
  tokens_total: number | null;
  cost_cents: number | null;
  latency_ms: number | null;
  timestamp: Date;
  created_at: Date;
}

interface SchedulingRow {
  id: string;
  lead_id: string;
  meeting_at: Date;
  status: string;
  assigned_agent: string | null;
  agent_email: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

const LEAD_CHANGE_COLUMNS: ReadonlyArray<[keyof LeadChanges, string]> = [
  ['name', 'name'],
  ['email', 'email'],
  ['region', 'region'],
  ['city', 'city'],
  ['interest', 'interest'],
  ['availability', 'availability'],
  ['status', 'status'],
  ['eligible', 'eligible'],
  ['followUpAttempts', 'follow_up_attempts'],
  ['lastFollowUpAt', 'last_follow_up_at'],
  ['nextFollowUpAt', 'next_follow_up_at'],
  ['preferredMeetingAt', 'preferred_meeting_at'],
  ['preferredTime', 'preferred_time'],
  ['lastInteractionAt', 'last_interaction_at'],
];

export function mapLeadRow(row: LeadRow): Lead {
  return {
    id: row.id,
    phone: row.phone,
    name: row.name,
    email: row.email,
    region: row.region,
    city: row.city,
    interest: row.interest,
    availability: row.availability,
    status: leadStatusFromStorage(row.status),
    eligible: row.eligible,
    followUpAttempts: row.follow_up_attempts,
    lastFollowUpAt: row.last_follow_up_at,
    nextFollowUpAt: row.next_follow_up_at,
    preferredMeetingAt: row.preferred_meeting_at,
    preferredTime: row.preferred_time,
    firstContactAt: row.first_contact_at,
    lastInteractionAt: row.last_interaction_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapConversationRow(row: ConversationRow): Conversation {
  return {
    id: row.id,
    leadId: row.lead_id,
    inboundText: row.inbound_text,
    outboundText: row.outbound_text,
    tokensInput: row.tokens_input,
    tokensOutput: row.tokens_output,
    tokensTotal: row.tokens_total,
    costCents: row.cost_cents,
    latencyMs: row.latency_ms,
    timestamp: row.timestamp,
    createdAt: row.created_at,
  };
}

function mapSchedulingRow(row: SchedulingRow): Scheduling {
  return {
    id: row.id,
    leadId: row.lead_id,
    meetingAt: row.meeting_at,
    status: schedulingStatusFromStorage(row.status),
    assignedAgent: row.assigned_agent,
    agentEmail: row.agent_email,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

async function persist<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    logger.error('Database operation failed', { operation, error: toError(error).message });
    throw new PersistenceError(operation, toError(error));
  }
}

class PgLeadUnitOfWork implements LeadUnitOfWork {
  constructor(private client: PoolClient) {}

  async lockContact(phone: string): Promise<void> {
    await persist('lockContact', () => query('SELECT pg_advisory_xact_lock(hashtext($1))', [phone], this.client));
  }

  async findLeadByPhone(phone: string): Promise<Lead | null> {
    return persist('findLeadByPhone', async () => {
      const result = await query<LeadRow>('SELECT * FROM leads WHERE phone = $1 FOR UPDATE', [phone], this.client);
      return result.rows[0] ? mapLeadRow(result.rows[0]) : null;
    });
  }

  async findLeadById(leadId: string): Promise<Lead | null> {
    return persist('findLeadById', async () => {
      const result = await query<LeadRow>('SELECT * FROM leads WHERE id = $1 FOR UPDATE', [leadId], this.client);
      return result.rows[0] ? mapLeadRow(result.rows[0]) : null;
    });
  }

  async createLead(phone: string, firstContactAt: Date): Promise<Lead> {
    return persist('createLead', async () => {
      const inserted = await query<LeadRow>(
        `INSERT INTO leads (id, phone, status, first_contact_at, last_interaction_at)
         VALUES ($1, $2, $3, $4, $4)
         ON CONFLICT (phone) DO NOTHING
         RETURNING *`,
        [uuidv4(), phone, leadStatusToStorage('NEW'), firstContactAt],
        this.client
      );

      if (inserted.rows[0]) {
        return mapLeadRow(inserted.rows[0]);
      }

      // Lost the race against another writer; the row exists now.
      const existing = await query<LeadRow>('SELECT * FROM leads WHERE phone = $1 FOR UPDATE', [phone], this.client);
      if (!existing.rows[0]) {
        throw new Error(`Lead for ${phone} neither inserted nor found`);
      }
      return mapLeadRow(existing.rows[0]);
    });
  }

  async updateLead(leadId: string, changes: LeadChanges): Promise<Lead> {
    return persist('updateLead', async () => {
      const assignments: string[] = [];
      const params: unknown[] = [];

      const stored = { ...changes, status: changes.status && leadStatusToStorage(changes.status) };

      for (const [key, column] of LEAD_CHANGE_COLUMNS) {
        const value = stored[key];
        if (value === undefined) continue;
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }

      params.push(leadId);
      const result = await query<LeadRow>(
        `UPDATE leads SET ${[...assignments, 'updated_at = NOW()'].join(', ')}
         WHERE id = $${params.length}
         RETURNING *`,
        params,
        this.client
      );

      if (!result.rows[0]) {
        throw new Error(`Lead ${leadId} not found for update`);
      }
      return mapLeadRow(result.rows[0]);
    });
  }

  async addConversation(conversation: NewConversation): Promise<Conversation> {
    return persist('addConversation', async () => {
      const result = await query<ConversationRow>(
        `INSERT INTO conversations
           (id, lead_id, inbound_text, outbound_text, tokens_input, tokens_output, tokens_total, cost_cents, latency_ms)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING *`,
        [
          uuidv4(),
          conversation.leadId,
          conversation.inboundText,
          conversation.outboundText,
          conversation.tokensInput,
          conversation.tokensOutput,
          conversation.tokensTotal,
          conversation.costCents,
          conversation.latencyMs,
        ],
        this.client
      );
      return mapConversationRow(result.rows[0]);
    });
  }
}

export class DatabaseService implements LeadStore, ReportingStore {
  async transaction<T>(work: (uow: LeadUnitOfWork) => Promise<T>): Promise<T> {
    try {
      return await withTransaction((client) => work(new PgLeadUnitOfWork(client)));
    } catch (error) {
      if (error instanceof PersistenceError || error instanceof AppError) throw error;
      throw new PersistenceError('transaction', toError(error));
    }
  }

  async getRecentConversations(leadId: string, limit: number): Promise<Conversation[]> {
    return persist('getRecentConversations', async () => {
      const result = await query<ConversationRow>(
        `SELECT * FROM (
           SELECT * FROM conversations
           WHERE lead_id = $1
           ORDER BY timestamp DESC, created_at DESC
           LIMIT $2
         ) recent
         ORDER BY timestamp ASC, created_at ASC`,
        [leadId, limit]
      );
      return result.rows.map(mapConversationRow);
    });
  }

  async findLeadsDueForFollowUp(now: Date, limit: number): Promise<Lead[]> {
    return persist('findLeadsDueForFollowUp', async () => {
      const result = await query<LeadRow>(
        `SELECT * FROM leads
         WHERE status = $1
           AND next_follow_up_at IS NOT NULL
           AND next_follow_up_at <= $2
           AND (last_follow_up_at IS NULL OR last_follow_up_at < next_follow_up_at)
         ORDER BY next_follow_up_at ASC
         LIMIT $3`,
        [leadStatusToStorage('AWAITING_RESPONSE'), now, limit]
      );
      return result.rows.map(mapLeadRow);
    });
  }

  async getLead(leadId: string): Promise<Lead | null> {
    return persist('getLead', async () => {
      const result = await query<LeadRow>('SELECT * FROM leads WHERE id = $1', [leadId]);
      return result.rows[0] ? mapLeadRow(result.rows[0]) : null;
    });
  }

  async listLeads(filter: LeadListFilter): Promise<{ total: number; leads: Lead[] }> {
    return persist('listLeads', async () => {
      const where = filter.status ? 'WHERE status = $1' : '';
      const filterParams = filter.status ? [leadStatusToStorage(filter.status)] : [];

      const [count, rows] = await Promise.all([
        query<{ total: string }>(`SELECT COUNT(*) AS total FROM leads ${where}`, filterParams),
        query<LeadRow>(
          `SELECT * FROM leads ${where}
           ORDER BY created_at DESC
           LIMIT $${filterParams.length + 1} OFFSET $${filterParams.length + 2}`,
          [...filterParams, filter.limit, filter.offset]
        ),
      ]);

      return {
        total: parseInt(count.rows[0]?.total || '0', 10),
        leads: rows.rows.map(mapLeadRow),
      };
    });
  }

  async getConversations(leadId: string): Promise<Conversation[]> {
    return persist('getConversations', async () => {
      const result = await query<ConversationRow>(
        'SELECT * FROM conversations WHERE lead_id = $1 ORDER BY timestamp ASC, created_at ASC',
        [leadId]
      );
      return result.rows.map(mapConversationRow);
    });
  }

  async getSchedulings(leadId: string): Promise<Scheduling[]> {
    return persist('getSchedulings', async () => {
      const result = await query<SchedulingRow>(
        'SELECT * FROM schedulings WHERE lead_id = $1 ORDER BY meeting_at ASC',
        [leadId]
      );
      return result.rows.map(mapSchedulingRow);
    });
  }

  async getUsageStats(now: Date): Promise<UsageStats> {
    return persist('getUsageStats', async () => {
      const since = new Date(now.getTime() - 24 * 60 * 60 * 1000);

      const [leads, byStatus, conversations, schedulings] = await Promise.all([
        query<{ total: string; new_24h: string }>(
          `SELECT COUNT(*) AS total, COUNT(*) FILTER (WHERE created_at >= $1) AS new_24h FROM leads`,
          [since]
        ),
        query<{ status: string; count: string }>(
          'SELECT status, COUNT(*) AS count FROM leads GROUP BY status'
        ),
        query<{ total: string; total_tokens: string | null; total_cost: string | null; avg_latency: string | null }>(
          `SELECT COUNT(*) AS total,
                  SUM(tokens_total) AS total_tokens,
                  SUM(cost_cents) AS total_cost,
                  AVG(latency_ms) AS avg_latency
           FROM conversations`
        ),
        query<{ total: string; upcoming: string }>(
          `SELECT COUNT(*) AS total,
                  COUNT(*) FILTER (WHERE status = $1 AND meeting_at > $2) AS upcoming
           FROM schedulings`,
          [schedulingStatusToStorage('SCHEDULED'), now]
        ),
      ]);

      const statusBreakdown: Partial<Record<LeadStatus, number>> = {};
      for (const row of byStatus.rows) {
        statusBreakdown[leadStatusFromStorage(row.status)] = parseInt(row.count, 10);
      }

      return {
        leads: {
          total: parseInt(leads.rows[0]?.total || '0', 10),
          new24h: parseInt(leads.rows[0]?.new_24h || '0', 10),
          byStatus: statusBreakdown,
        },
        conversations: {
          total: parseInt(conversations.rows[0]?.total || '0', 10),
          totalTokens: parseInt(conversations.rows[0]?.total_tokens || '0', 10),
          totalCostCents: parseInt(conversations.rows[0]?.total_cost || '0', 10),
          averageLatencyMs: parseFloat(conversations.rows[0]?.avg_latency || '0'),
        },
        schedulings: {
          total: parseInt(schedulings.rows[0]?.total || '0', 10),
          upcoming: parseInt(schedulings.rows[0]?.upcoming || '0', 10),
        },
      };
    });
  }
}
