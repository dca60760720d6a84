export type HistoryRole = 'user' | 'assistant';

export interface HistoryTurn {
  role: HistoryRole;
  content: string;
}

export interface GeneratedReply {
  text: string;
  tokensInput?: number;
  tokensOutput?: number;
  tokensTotal?: number;
  costUsd?: number;
  /** integer US cents, truncated */
  costCents?: number;
  latencyMs: number;
  model: string;
}

export type GenerationFailureKind = 'timeout' | 'upstream';

export interface GenerationFailure {
  kind: GenerationFailureKind;
  message: string;
}

export type GenerationOutcome = { ok: true; reply: GeneratedReply } | { ok: false; failure: GenerationFailure };

export interface ResponseGenerator {
  readonly provider: string;
  generate(systemPrompt: string, history: HistoryTurn[], newMessage: string): Promise<GenerationOutcome>;
}

export interface GeneratorOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  /** first backoff delay after a 429; doubles on every retry */
  retryBaseDelayMs?: number;
}

export interface TokenPricing {
  inputPer1K: number;
  outputPer1K: number;
}

export function estimateCost(
  pricing: TokenPricing,
  tokensInput: number | undefined,
  tokensOutput: number | undefined
): { costUsd?: number; costCents?: number } {
  if (tokensInput === undefined || tokensOutput === undefined) {
    return {};
  }
  const costUsd = (tokensInput / 1000) * pricing.inputPer1K + (tokensOutput / 1000) * pricing.outputPer1K;
  return { costUsd, costCents: Math.trunc(costUsd * 100) };
}

export function sumTokens(tokensInput: number | undefined, tokensOutput: number | undefined): number | undefined {
  if (tokensInput === undefined && tokensOutput === undefined) return undefined;
  return (tokensInput ?? 0) + (tokensOutput ?? 0);
}

export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
