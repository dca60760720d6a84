import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const KEY_PREFIX = 'wa:msg:';

/** The subset of the node-redis client the dedupe guard needs. */
export interface DedupeClient {
  set(key: string, value: string, options: { NX: true; EX: number }): Promise<unknown>;
}

export class MessageDedupeService {
  constructor(
    private client: DedupeClient,
    private ttlSeconds: number = 600
  ) {}

  /**
   * Claims a message id. Returns false when the id was already claimed.
   * Redis failures let the message through.
   */
  async claim(messageId: string): Promise<boolean> {
    try {
      const result = await this.client.set(`${KEY_PREFIX}${messageId}`, '1', { NX: true, EX: this.ttlSeconds });
      return result === 'OK';
    } catch (error) {
      logger.warn('Dedupe check failed, processing message anyway', { messageId, error: errorMessage(error) });
      return true;
    }
  }
}
