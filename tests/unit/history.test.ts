jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { ConversationHistoryBuilder } from '../../src/services/history.service';
import { logger } from '../../src/utils/logger';
import { InMemoryLeadStore } from '../helpers/inMemoryLeadStore';

describe('ConversationHistoryBuilder', () => {
  const base = new Date('2026-01-10T10:00:00.000Z').getTime();
  let store: InMemoryLeadStore;

  beforeEach(() => {
    store = new InMemoryLeadStore();
  });

  it('returns an empty history for a lead without conversations', async () => {
    const lead = store.seedLead({ phone: '5551999999999' });

    expect(await new ConversationHistoryBuilder(store).build(lead.id)).toEqual([]);
  });

  it('keeps the 10 most recent rows as 20 alternating turns', async () => {
    const lead = store.seedLead({ phone: '5551999999999' });
    // inserted out of order on purpose
    for (const i of [3, 0, 14, 7, 1, 12, 5, 9, 2, 11, 4, 13, 6, 10, 8]) {
      store.seedConversation(lead.id, `in ${i}`, `out ${i}`, new Date(base + i * 1000));
    }

    const history = await new ConversationHistoryBuilder(store).build(lead.id);

    expect(history).toHaveLength(20);
    expect(history.map((turn) => turn.role)).toEqual(Array.from({ length: 10 }, () => ['user', 'assistant']).flat());
    expect(history.filter((turn) => turn.role === 'user').map((turn) => turn.content)).toEqual([
      'in 5',
      'in 6',
      'in 7',
      'in 8',
      'in 9',
      'in 10',
      'in 11',
      'in 12',
      'in 13',
      'in 14',
    ]);
    expect(history[19]).toEqual({ role: 'assistant', content: 'out 14' });
  });

  it('honours a custom limit', async () => {
    const lead = store.seedLead({ phone: '5551999999999' });
    for (let i = 0; i < 4; i++) {
      store.seedConversation(lead.id, `in ${i}`, `out ${i}`, new Date(base + i * 1000));
    }

    const history = await new ConversationHistoryBuilder(store, 2).build(lead.id);

    expect(history).toEqual([
      { role: 'user', content: 'in 2' },
      { role: 'assistant', content: 'out 2' },
      { role: 'user', content: 'in 3' },
      { role: 'assistant', content: 'out 3' },
    ]);
  });

  it('only includes rows of the requested lead', async () => {
    const lead = store.seedLead({ phone: '5551999999999' });
    const other = store.seedLead({ phone: '5575999999999' });
    store.seedConversation(other.id, 'alheio', 'alheio', new Date(base));
    store.seedConversation(lead.id, 'meu', 'resposta', new Date(base + 1000));

    const history = await new ConversationHistoryBuilder(store).build(lead.id);

    expect(history).toEqual([
      { role: 'user', content: 'meu' },
      { role: 'assistant', content: 'resposta' },
    ]);
  });

  it('logs and returns an empty history when the read fails', async () => {
    store.failOn('getRecentConversations');

    const history = await new ConversationHistoryBuilder(store).build('lead-x');

    expect(history).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Failed to load conversation history', {
      leadId: 'lead-x',
      error: 'database.getRecentConversations failed: injected failure',
    });
  });
});
