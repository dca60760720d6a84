import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import {
  estimateCost,
  GenerationOutcome,
  GeneratorOptions,
  HistoryTurn,
  ResponseGenerator,
  sleep,
  statusOf,
  sumTokens,
  TokenPricing,
} from './response.generator';

// claude haiku list price, USD per 1K tokens
export const ANTHROPIC_PRICING: TokenPricing = { inputPer1K: 0.0008, outputPer1K: 0.004 };

export class AnthropicGenerator implements ResponseGenerator {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor(
    apiKey: string,
    private options: GeneratorOptions
  ) {
    this.client = new Anthropic({ apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async generate(systemPrompt: string, history: HistoryTurn[], newMessage: string): Promise<GenerationOutcome> {
    const start = Date.now();
    const baseDelay = this.options.retryBaseDelayMs ?? 1000;
    const messages: Anthropic.MessageParam[] = [
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: newMessage },
    ];

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        const response = await this.client.messages.create({
          model: this.options.model,
          system: systemPrompt,
          messages,
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        });

        const latencyMs = Date.now() - start;
        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();
        if (!text) {
          logger.error('Anthropic returned an empty message', { model: this.options.model, attempt });
          return { ok: false, failure: { kind: 'upstream', message: 'Empty message from Anthropic' } };
        }

        const tokensInput = response.usage?.input_tokens;
        const tokensOutput = response.usage?.output_tokens;
        const reply = {
          text,
          tokensInput,
          tokensOutput,
          tokensTotal: sumTokens(tokensInput, tokensOutput),
          ...estimateCost(ANTHROPIC_PRICING, tokensInput, tokensOutput),
          latencyMs,
          model: response.model || this.options.model,
        };

        logger.debug('Anthropic response generated', { tokens: reply.tokensTotal, latencyMs, attempt });
        return { ok: true, reply };
      } catch (error) {
        if (error instanceof Anthropic.APIConnectionTimeoutError) {
          logger.warn('Anthropic request timed out', { timeoutMs: this.options.timeoutMs, attempt });
          return { ok: false, failure: { kind: 'timeout', message: errorMessage(error) } };
        }

        if (statusOf(error) === 429 && attempt < this.options.maxAttempts) {
          const delay = baseDelay * Math.pow(2, attempt - 1);
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        logger.error('Anthropic error', { attempt, status: statusOf(error), error: errorMessage(error) });
        return { ok: false, failure: { kind: 'upstream', message: errorMessage(error) } };
      }
    }

    return { ok: false, failure: { kind: 'upstream', message: 'Anthropic attempts exhausted' } };
  }
}
