import { Env } from '../../config/env';
import { EvolutionConfig, WhatsAppSender } from './whatsapp.adapter';
import { logger } from '../../utils/logger';
import { ServiceError, toError } from '../../utils/errors';

export class EvolutionAdapter implements WhatsAppSender {
  private baseUrl: string;
  private maxAttempts: number;
  private retryBaseDelayMs: number;

  constructor(private config: EvolutionConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
  }

  async sendText(phone: string, text: string): Promise<void> {
    const path = `/message/sendText/${encodeURIComponent(this.config.instance)}`;
    let lastError: Error = new Error('No attempt made');

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const res = await fetch(`${this.baseUrl}${path}`, {
          method: 'POST',
          headers: {
            apikey: this.config.apiKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ number: phone, text }),
        });

        if (res.status === 429 && attempt < this.maxAttempts) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
          logger.warn('Evolution API rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (!res.ok) {
          const errorBody = await res.text();
          throw new Error(`Evolution API POST ${path} returned ${res.status}: ${errorBody}`);
        }

        logger.info('WhatsApp message sent', { phone, attempt });
        return;
      } catch (error) {
        lastError = toError(error);
        // client errors other than rate limiting will not succeed on retry
        if (/returned 4\d\d/.test(lastError.message)) break;
        if (attempt < this.maxAttempts) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
          logger.warn('Evolution API request failed, retrying', { attempt, error: lastError.message });
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw new ServiceError('EvolutionAPI', 'sendText', lastError, false);
  }
}

/** Returns null when the Evolution API is not configured; replies are then not delivered. */
export function createWhatsAppSender(config: Env): WhatsAppSender | null {
  if (!config.EVOLUTION_API_URL || !config.EVOLUTION_API_KEY || !config.EVOLUTION_INSTANCE_ID) {
    logger.warn('Evolution API not configured, replies will not be sent');
    return null;
  }
  return new EvolutionAdapter({
    baseUrl: config.EVOLUTION_API_URL,
    apiKey: config.EVOLUTION_API_KEY,
    instance: config.EVOLUTION_INSTANCE_ID,
  });
}
