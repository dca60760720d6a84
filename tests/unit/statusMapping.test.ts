import { LEAD_STATUSES, SCHEDULING_STATUSES } from '../../src/types/lead';
import {
  leadStatusFromStorage,
  leadStatusToStorage,
  schedulingStatusFromStorage,
  schedulingStatusToStorage,
} from '../../src/utils/statusMapping';

describe('status mapping', () => {
  it('maps lead statuses to their storage labels', () => {
    expect(LEAD_STATUSES.map(leadStatusToStorage)).toEqual([
      'novo',
      'em_triagem',
      'aguardando_resposta',
      'agendado',
      'nao_elegivel',
      'sem_resposta',
      'recuperando',
      'inativo',
    ]);
  });

  it('reads lead statuses back from storage', () => {
    expect(leadStatusFromStorage('em_triagem')).toBe('IN_SCREENING');
    expect(leadStatusFromStorage('nao_elegivel')).toBe('NOT_ELIGIBLE');
  });

  it('maps scheduling statuses both ways', () => {
    expect(SCHEDULING_STATUSES.map(schedulingStatusToStorage)).toEqual([
      'agendado',
      'confirmado',
      'realizado',
      'cancelado',
      'nao_compareceu',
    ]);
    expect(schedulingStatusFromStorage('nao_compareceu')).toBe('NO_SHOW');
  });

  it('rejects unknown storage values', () => {
    expect(() => leadStatusFromStorage('perdido')).toThrow('Unknown lead status in storage: perdido');
    expect(() => schedulingStatusFromStorage('NEW')).toThrow('Unknown scheduling status in storage: NEW');
  });
});
