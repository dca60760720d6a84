import fs from 'fs';
import path from 'path';
import { Lead } from '../types/lead';
import { logger } from './logger';
import { errorMessage } from './errors';

export const FALLBACK_SYSTEM_PROMPT = 'Você é um assistente útil. Ajude o usuário.';

/** Reads `prompts/<version>/system.txt`, falling back to a generic prompt when it is missing. */
export function loadSystemPrompt(version: string, baseDir: string = path.join(process.cwd(), 'prompts')): string {
  const file = path.join(baseDir, version, 'system.txt');
  try {
    const content = fs.readFileSync(file, 'utf8').trim();
    if (content) return content;
    logger.warn('System prompt file is empty, using fallback', { file });
  } catch (error) {
    logger.warn('System prompt not found, using fallback', { file, error: errorMessage(error) });
  }
  return FALLBACK_SYSTEM_PROMPT;
}

export type LeadPromptContext = Pick<Lead, 'name' | 'region' | 'city' | 'interest' | 'availability' | 'eligible'>;

export function buildSystemPrompt(basePrompt: string, lead?: LeadPromptContext | null): string {
  const parts: string[] = [basePrompt];

  if (lead) {
    const known: string[] = [];

    if (lead.name) known.push(`Nome: ${lead.name}`);
    if (lead.city && lead.region) {
      known.push(`Localização: ${lead.city}/${lead.region}`);
    } else if (lead.region) {
      known.push(`Estado: ${lead.region}`);
    } else if (lead.city) {
      known.push(`Cidade: ${lead.city}`);
    }
    if (lead.interest) known.push(`Interesse: ${lead.interest}`);
    if (lead.availability) known.push(`Disponibilidade: ${lead.availability}`);
    if (lead.eligible === true) known.push('Região elegível para franquias.');
    if (lead.eligible === false) known.push('Região ainda não atendida; registre o interesse para futuras expansões.');

    if (known.length > 0) {
      parts.push(`\nDADOS JÁ CONHECIDOS DO INTERESSADO (não pergunte de novo):\n${known.join('\n')}`);
    }
  }

  return parts.join('\n');
}
