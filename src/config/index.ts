import * as dotenv from 'dotenv';

dotenv.config();

function toInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

export const config = {
  port: toInt(process.env.PORT, 3002),

  // OpenAI-compatible model endpoint used for round generation
  openAiApiKey: process.env.OPENAI_API_KEY || '',
  openAiBaseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
  openAiModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  openAiMaxTokens: toInt(process.env.OPENAI_MAX_TOKENS, 1000),
  openAiTemperature: Number(process.env.OPENAI_TEMPERATURE || 0.7),
  /** Connect + read deadline for a single round request. */
  openAiTimeoutMs: toInt(process.env.OPENAI_TIMEOUT_MS, 30_000),

  // Empty => history lives in process memory only.
  redisUrl: process.env.REDIS_URL || '',
  redisCommandTimeoutMs: toInt(process.env.REDIS_COMMAND_TIMEOUT_MS, 5000),

  /** Explicit prompt file; otherwise /app/config.yaml and the repo root are tried. */
  promptConfigPath: (process.env.PROMPT_CONFIG_PATH ?? '').trim(),

  roundPollIntervalMs: toInt(process.env.ROUND_POLL_INTERVAL_MS, 500),
  sseKeepAliveMs: toInt(process.env.SSE_KEEPALIVE_MS, 20_000),

  staticDir: (process.env.STATIC_DIR ?? '').trim(),

  logLevel: process.env.LOG_LEVEL || 'info',
};

/** Rounds kept per session (history, prompt log, response log). */
export const MAX_HISTORY = 100;

/** Sliding expiry for every persisted session key, in seconds. */
export const SESSION_EXPIRY_SECONDS = 60 * 60 * 24 * 30;

/** Rounds rendered into the prompt's "previous statements" block. */
export const PROMPT_HISTORY_WINDOW = 15;
