import OpenAI from 'openai';
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

// gpt-4o-mini list price, USD per 1K tokens
export const OPENAI_PRICING: TokenPricing = { inputPer1K: 0.00015, outputPer1K: 0.0006 };

function toMessage(turn: HistoryTurn): OpenAI.Chat.ChatCompletionMessageParam {
  return turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content };
}

export class OpenAIGenerator implements ResponseGenerator {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(
    apiKey: string,
    private options: GeneratorOptions
  ) {
    // Retries are handled below so that only rate limits are retried.
    this.client = new OpenAI({ apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async generate(systemPrompt: string, history: HistoryTurn[], newMessage: string): Promise<GenerationOutcome> {
    const start = Date.now();
    const baseDelay = this.options.retryBaseDelayMs ?? 1000;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        const response = await this.client.chat.completions.create({
          model: this.options.model,
          messages: [
            { role: 'system', content: systemPrompt },
            ...history.map(toMessage),
            { role: 'user', content: newMessage },
          ],
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        });

        const latencyMs = Date.now() - start;
        const text = response.choices[0]?.message?.content?.trim() ?? '';
        if (!text) {
          logger.error('OpenAI returned an empty completion', { model: this.options.model, attempt });
          return { ok: false, failure: { kind: 'upstream', message: 'Empty completion from OpenAI' } };
        }

        const tokensInput = response.usage?.prompt_tokens;
        const tokensOutput = response.usage?.completion_tokens;
        const reply = {
          text,
          tokensInput,
          tokensOutput,
          tokensTotal: response.usage?.total_tokens ?? sumTokens(tokensInput, tokensOutput),
          ...estimateCost(OPENAI_PRICING, tokensInput, tokensOutput),
          latencyMs,
          model: response.model || this.options.model,
        };

        logger.debug('OpenAI response generated', { tokens: reply.tokensTotal, latencyMs, attempt });
        return { ok: true, reply };
      } catch (error) {
        if (error instanceof OpenAI.APIConnectionTimeoutError) {
          logger.warn('OpenAI request timed out', { timeoutMs: this.options.timeoutMs, attempt });
          return { ok: false, failure: { kind: 'timeout', message: errorMessage(error) } };
        }

        if (statusOf(error) === 429 && attempt < this.options.maxAttempts) {
          const delay = baseDelay * Math.pow(2, attempt - 1);
          logger.warn('OpenAI rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        logger.error('OpenAI error', { attempt, status: statusOf(error), error: errorMessage(error) });
        return { ok: false, failure: { kind: 'upstream', message: errorMessage(error) } };
      }
    }

    return { ok: false, failure: { kind: 'upstream', message: 'OpenAI attempts exhausted' } };
  }
}
