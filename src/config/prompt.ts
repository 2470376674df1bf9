import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const PromptConfigSchema = z.object({
  round_prompt: z.string().trim().min(1),
});

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

/** Candidate locations for config.yaml, most specific first. */
export function promptConfigCandidates(explicitPath?: string): string[] {
  const out: string[] = [];
  if (explicitPath) out.push(explicitPath);
  out.push('/app/config.yaml', path.join(repoRoot, 'config.yaml'));
  return out;
}

/**
 * Loads the round prompt template from the first readable config file.
 * Returns an empty string when none of the candidates yields a prompt; the
 * generator reports PromptNotLoaded in that case.
 */
export async function loadRoundPrompt(candidates: string[]): Promise<string> {
  for (const file of candidates) {
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      logger.debug('prompt_config_unreadable', { file, err: String(err) });
      continue;
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      logger.error('prompt_config_invalid_yaml', { file, err: String(err) });
      continue;
    }

    const parsed = PromptConfigSchema.safeParse(doc);
    if (!parsed.success) {
      logger.error('prompt_config_missing_round_prompt', { file });
      continue;
    }

    logger.info('prompt_config_loaded', { file, length: parsed.data.round_prompt.length });
    return parsed.data.round_prompt;
  }

  logger.error('prompt_config_not_found', { tried: candidates });
  return '';
}
