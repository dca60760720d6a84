import { LEAD_STATUSES, LeadStatus, SCHEDULING_STATUSES, SchedulingStatus } from '../types/lead';

// Storage values are the PostgreSQL enum labels (see migrations/001_initial_schema.sql).
const LEAD_STATUS_TO_STORAGE: Record<LeadStatus, string> = {
  NEW: 'novo',
  IN_SCREENING: 'em_triagem',
  AWAITING_RESPONSE: 'aguardando_resposta',
  SCHEDULED: 'agendado',
  NOT_ELIGIBLE: 'nao_elegivel',
  NO_RESPONSE: 'sem_resposta',
  RECOVERING: 'recuperando',
  INACTIVE: 'inativo',
};

const SCHEDULING_STATUS_TO_STORAGE: Record<SchedulingStatus, string> = {
  SCHEDULED: 'agendado',
  CONFIRMED: 'confirmado',
  COMPLETED: 'realizado',
  CANCELLED: 'cancelado',
  NO_SHOW: 'nao_compareceu',
};

function invert<K extends string>(keys: readonly K[], mapping: Record<K, string>): Map<string, K> {
  const inverted = new Map<string, K>();
  for (const key of keys) {
    inverted.set(mapping[key], key);
  }
  return inverted;
}

const LEAD_STATUS_FROM_STORAGE = invert(LEAD_STATUSES, LEAD_STATUS_TO_STORAGE);
const SCHEDULING_STATUS_FROM_STORAGE = invert(SCHEDULING_STATUSES, SCHEDULING_STATUS_TO_STORAGE);

export function leadStatusToStorage(status: LeadStatus): string {
  return LEAD_STATUS_TO_STORAGE[status];
}

export function leadStatusFromStorage(value: string): LeadStatus {
  const status = LEAD_STATUS_FROM_STORAGE.get(value);
  if (!status) {
    throw new Error(`Unknown lead status in storage: ${value}`);
  }
  return status;
}

export function schedulingStatusToStorage(status: SchedulingStatus): string {
  return SCHEDULING_STATUS_TO_STORAGE[status];
}

export function schedulingStatusFromStorage(value: string): SchedulingStatus {
  const status = SCHEDULING_STATUS_FROM_STORAGE.get(value);
  if (!status) {
    throw new Error(`Unknown scheduling status in storage: ${value}`);
  }
  return status;
}
