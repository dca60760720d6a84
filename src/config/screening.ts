import { Env, parseList } from './env';
import { RegionConfig } from '../services/regional.service';
import { loadSystemPrompt } from '../utils/prompts';

export interface ScreeningConfig {
  regions: RegionConfig;
  followUpDelayHours: number;
  historyLimit: number;
  maxMessageLength: number;
  systemPrompt: string;
}

export const DEFAULT_FOLLOW_UP_DELAY_HOURS = 2;
export const DEFAULT_HISTORY_LIMIT = 10;

export function loadScreeningConfig(config: Env): ScreeningConfig {
  return {
    regions: {
      eligibleRegions: parseList(config.ELIGIBLE_REGIONS),
      interestRegions: parseList(config.INTEREST_REGIONS),
    },
    followUpDelayHours: config.FOLLOW_UP_DELAY_HOURS,
    historyLimit: config.HISTORY_LIMIT,
    maxMessageLength: config.MAX_MESSAGE_LENGTH,
    systemPrompt: loadSystemPrompt(config.PROMPT_VERSION),
  };
}
