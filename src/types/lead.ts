export const LEAD_STATUSES = [
  'NEW',
  'IN_SCREENING',
  'AWAITING_RESPONSE',
  'SCHEDULED',
  'NOT_ELIGIBLE',
  'NO_RESPONSE',
  'RECOVERING',
  'INACTIVE',
] as const;

export type LeadStatus = (typeof LEAD_STATUSES)[number];

export const SCHEDULING_STATUSES = ['SCHEDULED', 'CONFIRMED', 'COMPLETED', 'CANCELLED', 'NO_SHOW'] as const;

export type SchedulingStatus = (typeof SCHEDULING_STATUSES)[number];

export interface Lead {
  id: string;
  phone: string;
  name: string | null;
  email: string | null;
  region: string | null;
  city: string | null;
  interest: string | null;
  availability: string | null;
  status: LeadStatus;
  /** null until eligibility has been evaluated */
  eligible: boolean | null;
  followUpAttempts: number;
  lastFollowUpAt: Date | null;
  nextFollowUpAt: Date | null;
  preferredMeetingAt: Date | null;
  preferredTime: string | null;
  firstContactAt: Date;
  lastInteractionAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type LeadChanges = Partial<
  Pick<
    Lead,
    | 'name'
    | 'email'
    | 'region'
    | 'city'
    | 'interest'
    | 'availability'
    | 'status'
    | 'eligible'
    | 'followUpAttempts'
    | 'lastFollowUpAt'
    | 'nextFollowUpAt'
    | 'preferredMeetingAt'
    | 'preferredTime'
    | 'lastInteractionAt'
  >
>;

export interface Conversation {
  id: string;
  leadId: string;
  inboundText: string;
  outboundText: string;
  tokensInput: number | null;
  tokensOutput: number | null;
  tokensTotal: number | null;
  /** integer US cents */
  costCents: number | null;
  latencyMs: number | null;
  timestamp: Date;
  createdAt: Date;
}

export type NewConversation = Omit<Conversation, 'id' | 'timestamp' | 'createdAt'>;

export interface Scheduling {
  id: string;
  leadId: string;
  meetingAt: Date;
  status: SchedulingStatus;
  assignedAgent: string | null;
  agentEmail: string | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export function isLeadStatus(value: string): value is LeadStatus {
  return LEAD_STATUSES.some((status) => status === value);
}

export function isUpcoming(scheduling: Pick<Scheduling, 'meetingAt'>, now: Date = new Date()): boolean {
  return scheduling.meetingAt.getTime() > now.getTime();
}

export function isPast(scheduling: Pick<Scheduling, 'meetingAt'>, now: Date = new Date()): boolean {
  return scheduling.meetingAt.getTime() < now.getTime();
}
