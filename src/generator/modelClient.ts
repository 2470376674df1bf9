import OpenAI from 'openai';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

/** Prompt in, text out. Implementations throw the SDK's errors untouched. */
export interface ModelClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

type OpenAiModelClientOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

/**
 * OpenAI-compatible chat completion client for round generation.
 * One SDK instance per process; the SDK's own retries are disabled so a failed
 * round surfaces immediately as an error event.
 */
export class OpenAiModelClient implements ModelClient {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiModelClientOptions) {
    this.client = new OpenAI({
      baseURL: opts.baseUrl,
      apiKey: opts.apiKey,
      maxRetries: 0,
    });
  }

  get model(): string {
    return this.opts.model;
  }

  async complete(prompt: string): Promise<string> {
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    const start = Date.now();

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.opts.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
        },
        { signal: ac.signal }
      );

      const content = completion.choices[0]?.message?.content ?? '';
      logger.info('model_call_done', {
        model: this.opts.model,
        elapsedMs: Date.now() - start,
        outputLength: content.length,
        finishReason: completion.choices[0]?.finish_reason,
      });
      return content;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Boot check that the key is accepted and the endpoint answers. */
  async checkConnection(): Promise<{ ok: boolean; error?: string }> {
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), 10_000);
    try {
      await this.client.chat.completions.create(
        { model: this.opts.model, messages: [{ role: 'user', content: 'Hi' }], max_tokens: 1 },
        { signal: ac.signal }
      );
      return { ok: true };
    } catch (err) {
      return { ok: false, error: String(err) };
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Null when no API key is configured; the generator then reports ClientNotConfigured. */
export function createModelClientFromConfig(): OpenAiModelClient | null {
  if (!config.openAiApiKey) return null;
  return new OpenAiModelClient({
    apiKey: config.openAiApiKey,
    baseUrl: config.openAiBaseUrl,
    model: config.openAiModel,
    maxTokens: config.openAiMaxTokens,
    temperature: config.openAiTemperature,
    timeoutMs: config.openAiTimeoutMs,
  });
}
