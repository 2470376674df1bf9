import type { Round } from '../domain/round.js';
import type { HistoryStore } from '../history/types.js';
import { Mutex } from '../utils/mutex.js';
import { logger, preview } from '../utils/logger.js';
import { GenerationError, toGenerationError } from './errors.js';
import { extractStructuredPayload, toRound } from './extract.js';
import type { ModelClient } from './modelClient.js';
import { buildRoundPrompt } from './prompt.js';

export type GenerationResult =
  | { ok: true; round: Round; roundNumber: number }
  | { ok: false; error: GenerationError };

type RoundGeneratorDeps = {
  model: ModelClient | null;
  /** Base prompt template; empty when config.yaml could not be loaded. */
  prompt: string;
  history: HistoryStore;
};

export class RoundGenerator {
  // One model call for rounds at a time, whether it serves a request or a preload.
  private readonly permit = new Mutex('round_generation');
  private inFlight = 0;
  private peakInFlight = 0;

  constructor(private readonly deps: RoundGeneratorDeps) {}

  stats(): { inFlight: number; peakInFlight: number; waiting: number } {
    return { inFlight: this.inFlight, peakInFlight: this.peakInFlight, waiting: this.permit.stats().queued };
  }

  async generate(sessionId: string): Promise<GenerationResult> {
    const { model, prompt } = this.deps;
    if (!model) {
      logger.error('round_generation_precondition_failed', { reason: 'client_not_configured' });
      return fail(new GenerationError('ClientNotConfigured', 'Model client not initialized. Check OPENAI_API_KEY.'));
    }
    if (!prompt) {
      logger.error('round_generation_precondition_failed', { reason: 'prompt_not_loaded' });
      return fail(new GenerationError('PromptNotLoaded', 'Round prompt not loaded. Check config.yaml.'));
    }

    return this.permit.runExclusive(async () => {
      this.inFlight += 1;
      this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
      try {
        return await this.generateUnlocked(sessionId, model, prompt);
      } finally {
        this.inFlight -= 1;
      }
    });
  }

  private async generateUnlocked(sessionId: string, model: ModelClient, basePrompt: string): Promise<GenerationResult> {
    const start = Date.now();
    const history = await this.deps.history.get(sessionId);
    const prompt = buildRoundPrompt(basePrompt, history);

    logger.info('round_generation_start', {
      sessionId,
      roundNumber: prompt.roundNumber,
      historyRounds: history.rounds.length,
      easterEgg: prompt.isEasterEggSet,
    });

    await this.safeLog('prompt', () =>
      this.deps.history.appendPromptLog(sessionId, {
        round_number: prompt.roundNumber,
        prompt: basePrompt,
        history_context: prompt.historyContext,
        full_prompt: prompt.fullPrompt,
        is_easter_egg_set: prompt.isEasterEggSet,
        timestamp: new Date().toISOString(),
      })
    );

    let text: string;
    try {
      text = await model.complete(prompt.fullPrompt);
    } catch (err) {
      const error = toGenerationError(err);
      logger.error('round_generation_failed', {
        sessionId,
        roundNumber: prompt.roundNumber,
        kind: error.kind,
        status: error.status,
        elapsedMs: Date.now() - start,
      });
      return fail(error);
    }

    logger.info('round_model_response', { roundNumber: prompt.roundNumber, text: preview(text) });

    await this.safeLog('response', () =>
      this.deps.history.appendResponseLog(sessionId, {
        round_number: prompt.roundNumber,
        response: text,
        timestamp: new Date().toISOString(),
      })
    );

    const extracted = extractStructuredPayload(text);
    if (!extracted.ok) {
      logger.error('round_parse_failed', { roundNumber: prompt.roundNumber, err: extracted.error.message });
      return fail(extracted.error);
    }
    if (extracted.repaired) {
      logger.info('round_json_repaired', { roundNumber: prompt.roundNumber, source: extracted.source });
    }

    const validated = toRound(extracted.value, text);
    if (!validated.ok) {
      logger.error('round_invalid', { roundNumber: prompt.roundNumber, err: validated.error.message });
      return fail(validated.error);
    }

    await this.deps.history.append(sessionId, validated.round);

    logger.info('round_generation_done', {
      sessionId,
      roundNumber: prompt.roundNumber,
      source: extracted.source,
      topics: validated.round.map(s => `${s.text.split(' ').slice(0, 3).join(' ')}...`),
      elapsedMs: Date.now() - start,
    });

    return { ok: true, round: validated.round, roundNumber: prompt.roundNumber };
  }

  private async safeLog(kind: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      logger.error('generation_log_store_failed', { kind, err: String(err) });
    }
  }
}

function fail(error: GenerationError): GenerationResult {
  return { ok: false, error };
}
