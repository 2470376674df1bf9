import { describe, it, expect } from 'vitest';
import { makeRound, roundJson } from '../testing/fixtures.js';
import { extractStructuredPayload, locateJsonCandidate, toRound } from './extract.js';

describe('locateJsonCandidate', () => {
  it('prefers the last fenced block', () => {
    const text = 'Draft:\n```json\n{"v": 1}\n```\nFinal:\n```json\n{"v": 2}\n```\nDone.';
    expect(locateJsonCandidate(text)).toEqual({ candidate: '{"v": 2}', source: 'code_block' });
  });

  it('accepts a fence without a language tag', () => {
    expect(locateJsonCandidate('```\n{"v": 3}\n```')).toEqual({ candidate: '{"v": 3}', source: 'code_block' });
  });

  it('falls back to the outermost braces', () => {
    expect(locateJsonCandidate('Sure! {"a": {"b": 1}} hope that helps')).toEqual({
      candidate: '{"a": {"b": 1}}',
      source: 'braces',
    });
  });

  it('falls back to the whole text', () => {
    expect(locateJsonCandidate('[1, 2]')).toEqual({ candidate: '[1, 2]', source: 'whole_text' });
  });
});

describe('extractStructuredPayload', () => {
  it('parses a fenced block surrounded by prose', () => {
    const text = `Here are your statements:\n\`\`\`json\n${roundJson('x')}\n\`\`\`\nHave fun!`;
    const res = extractStructuredPayload(text);
    expect(res).toEqual({ ok: true, value: { statements: makeRound('x') }, source: 'code_block', repaired: false });
  });

  it('repairs a document whose quotes were all escaped', () => {
    const res = extractStructuredPayload('{\\"a\\": \\"b\\"}');
    expect(res).toEqual({ ok: true, value: { a: 'b' }, source: 'braces', repaired: true });
  });

  it('reports a parse error with the raw text', () => {
    const res = extractStructuredPayload('no json here');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe('ParseError');
      expect(res.error.message).toMatch(/^Failed to parse response from LLM: /);
      expect(res.error.rawText).toBe('no json here');
    }
  });
});

describe('toRound', () => {
  it('returns the statements of a valid payload', () => {
    expect(toRound({ statements: makeRound(1) }, 'raw')).toEqual({ ok: true, round: makeRound(1) });
  });

  it('names the failing path', () => {
    const twoLies = makeRound(1).map(s => ({ ...s, isLie: s.text.startsWith('Truth A') || s.isLie }));
    const res = toRound({ statements: twoLies }, 'raw');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.message).toBe('Invalid round from LLM at statements: a round must contain exactly one lie');
      expect(res.error.rawText).toBe('raw');
    }
  });

  it('rejects a payload without statements', () => {
    const res = toRound({ rounds: [] }, 'raw');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('Invalid round from LLM at statements: Required');
  });
});
