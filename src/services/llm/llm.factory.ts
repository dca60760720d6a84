import { Env } from '../../config/env';
import { ResponseGenerator, GeneratorOptions } from './response.generator';
import { OpenAIGenerator } from './openai.adapter';
import { AnthropicGenerator } from './anthropic.adapter';

export class LLMFactory {
  static create(config: Env): ResponseGenerator {
    switch (config.LLM_PROVIDER) {
      case 'openai':
        if (!config.OPENAI_API_KEY) throw new Error('OPENAI_API_KEY is not configured');
        return new OpenAIGenerator(config.OPENAI_API_KEY, LLMFactory.options(config, config.OPENAI_MODEL));
      case 'anthropic':
        if (!config.ANTHROPIC_API_KEY) throw new Error('ANTHROPIC_API_KEY is not configured');
        return new AnthropicGenerator(config.ANTHROPIC_API_KEY, LLMFactory.options(config, config.ANTHROPIC_MODEL));
    }
  }

  private static options(config: Env, model: string): GeneratorOptions {
    return {
      model,
      maxTokens: config.LLM_MAX_TOKENS,
      temperature: config.LLM_TEMPERATURE,
      timeoutMs: config.LLM_TIMEOUT_SECONDS * 1000,
      maxAttempts: config.LLM_MAX_ATTEMPTS,
    };
  }
}
