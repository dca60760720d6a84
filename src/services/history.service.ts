import { LeadStore } from '../types/store';
import { HistoryTurn } from './llm/response.generator';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Rebuilds model turns from stored conversation rows. Each row contributes a
 * user turn followed by an assistant turn; rows come oldest first.
 */
export class ConversationHistoryBuilder {
  constructor(
    private store: Pick<LeadStore, 'getRecentConversations'>,
    private limit: number = 10
  ) {}

  async build(leadId: string): Promise<HistoryTurn[]> {
    try {
      const rows = await this.store.getRecentConversations(leadId, this.limit);
      return rows.flatMap((row): HistoryTurn[] => [
        { role: 'user', content: row.inboundText },
        { role: 'assistant', content: row.outboundText },
      ]);
    } catch (error) {
      logger.warn('Failed to load conversation history', { leadId, error: errorMessage(error) });
      return [];
    }
  }
}
