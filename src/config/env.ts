import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const DEFAULT_ELIGIBLE_REGIONS = 'RS,SC,PR,SP,RJ,MG,ES,GO,MT,MS,DF';
const DEFAULT_INTEREST_REGIONS = 'BA,PE,CE,RN,PB,AL,SE,PI,MA,AP,AM,RR,AC,TO';

export const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    LOG_LEVEL: optionalString,
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_TIMEOUT_SECONDS: z.coerce.number().positive().default(3),
    LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    LLM_COST_LIMIT_MONTHLY: z.coerce.number().nonnegative().default(20),
    PROMPT_VERSION: z.string().default('v1.0'),

    EVOLUTION_API_URL: optionalString,
    EVOLUTION_API_KEY: optionalString,
    EVOLUTION_INSTANCE_ID: optionalString,

    WEBHOOK_SECRET: z.string().min(1),
    API_KEYS: z.string().default(''),

    ELIGIBLE_REGIONS: z.string().default(DEFAULT_ELIGIBLE_REGIONS),
    INTEREST_REGIONS: z.string().default(DEFAULT_INTEREST_REGIONS),
    FOLLOW_UP_DELAY_HOURS: z.coerce.number().positive().default(2),
    MAX_MESSAGE_LENGTH: z.coerce.number().int().positive().default(5000),
    HISTORY_LIMIT: z.coerce.number().int().positive().default(10),

    SCHEDULER_ENABLED: booleanFlag,
    SCHEDULER_INTERVAL_MINUTES: z.coerce.number().int().positive().default(30),

    RATE_LIMIT_PER_PHONE: z.coerce.number().int().positive().default(30),
    RATE_LIMIT_GLOBAL: z.coerce.number().int().positive().default(100),
    WEBHOOK_DEDUPE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
    CORS_ORIGINS: z.string().default('*'),
    SENTRY_DSN: z.string().optional(),
  })
  .refine((value) => value.LLM_PROVIDER !== 'openai' || value.OPENAI_API_KEY !== undefined, {
    message: 'OPENAI_API_KEY is required when LLM_PROVIDER=openai',
    path: ['OPENAI_API_KEY'],
  })
  .refine((value) => value.LLM_PROVIDER !== 'anthropic' || value.ANTHROPIC_API_KEY !== undefined, {
    message: 'ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic',
    path: ['ANTHROPIC_API_KEY'],
  });

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;

export function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
