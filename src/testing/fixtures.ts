import type { Round } from '../domain/round.js';

/** A valid round whose statement texts carry `tag`, so rounds are easy to tell apart. */
export function makeRound(tag: string | number): Round {
  return [
    { text: `Truth A ${tag}`, isLie: false, explanation: `Because A ${tag}` },
    { text: `Truth B ${tag}`, isLie: false, explanation: `Because B ${tag}` },
    { text: `Lie C ${tag}`, isLie: true, explanation: `Not C ${tag}` },
  ];
}

export function roundJson(tag: string | number): string {
  return JSON.stringify({ statements: makeRound(tag) });
}
