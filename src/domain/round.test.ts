import { describe, it, expect } from 'vitest';
import { makeRound } from '../testing/fixtures.js';
import { RoundPayloadSchema, RoundStatementsSchema, isEasterEggRound } from './round.js';

describe('RoundStatementsSchema', () => {
  it('accepts three statements with exactly one lie', () => {
    expect(RoundStatementsSchema.safeParse(makeRound(1)).success).toBe(true);
  });

  it('rejects a round with two lies', () => {
    const round = makeRound(1).map((s, i) => (i === 0 ? { ...s, isLie: true } : s));
    const parsed = RoundStatementsSchema.safeParse(round);
    expect(parsed.success).toBe(false);
    if (!parsed.success) expect(parsed.error.issues[0]?.message).toBe('a round must contain exactly one lie');
  });

  it('rejects a round of the wrong length', () => {
    expect(RoundStatementsSchema.safeParse(makeRound(1).slice(0, 2)).success).toBe(false);
  });

  it('requires a boolean isLie', () => {
    const round = [{ text: 'a', isLie: 'yes', explanation: '' }, ...makeRound(1).slice(1)];
    expect(RoundStatementsSchema.safeParse(round).success).toBe(false);
  });
});

describe('RoundPayloadSchema', () => {
  it('ignores extra top-level fields', () => {
    const parsed = RoundPayloadSchema.safeParse({ statements: makeRound(1), theme: 'ships' });
    expect(parsed.success && parsed.data).toEqual({ statements: makeRound(1) });
  });
});

describe('isEasterEggRound', () => {
  it('is true for every third round', () => {
    expect([1, 2, 3, 4, 5, 6, 9].map(isEasterEggRound)).toEqual([false, false, true, false, false, true, true]);
  });
});
