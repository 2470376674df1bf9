import { RoundPayloadSchema, type Round } from '../domain/round.js';
import { GenerationError } from './errors.js';

export type ExtractionSource = 'code_block' | 'braces' | 'whole_text';

export type ExtractResult =
  | { ok: true; value: unknown; source: ExtractionSource; repaired: boolean }
  | { ok: false; error: GenerationError };

const CODE_BLOCK_RE = /```[\w-]*\s*([\s\S]*?)```/g;

/**
 * Picks the part of a model reply most likely to be the JSON document:
 * the last fenced block, else first "{" to last "}", else the whole text.
 */
export function locateJsonCandidate(text: string): { candidate: string; source: ExtractionSource } {
  const blocks = Array.from(text.matchAll(CODE_BLOCK_RE), m => m[1] ?? '');
  const lastBlock = blocks[blocks.length - 1];
  if (lastBlock !== undefined) {
    return { candidate: lastBlock.trim(), source: 'code_block' };
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return { candidate: text.slice(start, end + 1), source: 'braces' };
  }

  return { candidate: text, source: 'whole_text' };
}

function tryParse(s: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(s) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Free-form model text -> parsed JSON value, with one escaped-quote repair pass. */
export function extractStructuredPayload(text: string): ExtractResult {
  const { candidate, source } = locateJsonCandidate(text);

  const first = tryParse(candidate);
  if (first.ok) return { ok: true, value: first.value, source, repaired: false };

  // Models sometimes escape every quote in the document.
  const repairedText = candidate.trim().replaceAll('\\"', '"');
  const second = tryParse(repairedText);
  if (second.ok) return { ok: true, value: second.value, source, repaired: true };

  return {
    ok: false,
    error: new GenerationError('ParseError', `Failed to parse response from LLM: ${second.reason}`, { rawText: text }),
  };
}

/** Validates a parsed payload as a round: three statements, exactly one lie. */
export function toRound(value: unknown, rawText: string): { ok: true; round: Round } | { ok: false; error: GenerationError } {
  const parsed = RoundPayloadSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    return {
      ok: false,
      error: new GenerationError('ParseError', `Invalid round from LLM${where}: ${issue?.message ?? 'unknown issue'}`, {
        rawText,
      }),
    };
  }
  return { ok: true, round: parsed.data.statements };
}
