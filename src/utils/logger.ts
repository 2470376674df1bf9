type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(v: string): v is Level {
  return v in LEVEL_RANK;
}

// Read directly from env so importing the logger never pulls in the config module.
const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
let threshold: Level = isLevel(envLevel) ? envLevel : 'info';

function nowIso(): string {
  return new Date().toISOString();
}

function serialize(v: unknown): string {
  try {
    return typeof v === 'string' ? v : JSON.stringify(v);
  } catch {
    return String(v);
  }
}

export function setLogLevel(level: string): void {
  const l = level.toLowerCase();
  if (isLevel(l)) threshold = l;
}

export function log(level: Level, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

  const base = `[twotruths] ${nowIso()} ${level.toUpperCase()} ${message}`;
  const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>) {
    log('debug', message, meta);
  },
  info(message: string, meta?: Record<string, unknown>) {
    log('info', message, meta);
  },
  warn(message: string, meta?: Record<string, unknown>) {
    log('warn', message, meta);
  },
  error(message: string, meta?: Record<string, unknown>) {
    log('error', message, meta);
  },
};

/** Shortens long strings for log lines (model output can be several KB). */
export function preview(text: string, max = 250): string {
  if (text.length <= 2 * max) return text;
  return `${text.slice(0, max)}...${text.slice(-max)}`;
}
