import { PROMPT_HISTORY_WINDOW } from '../config/index.js';
import { isEasterEggRound, type History } from '../domain/round.js';

export type RoundPrompt = {
  roundNumber: number;
  /** Rendered previous-rounds block, or null for a fresh session. */
  historyContext: string | null;
  fullPrompt: string;
  isEasterEggSet: boolean;
};

export function easterEggInstruction(roundNumber: number): string {
  return (
    `\n\nIMPORTANT: This is set number ${roundNumber}, which is divisible by 3. ` +
    'PLEASE INCLUDE AN EASTER EGG as described in the instructions.'
  );
}

/** Lists recent rounds newest first; rounds[i] is round number roundCount - i. */
export function renderHistoryContext(history: History, window = PROMPT_HISTORY_WINDOW): string | null {
  const recent = history.rounds.slice(0, window);
  if (recent.length === 0) return null;

  const lines = ['Here are the previous statements used in this session:'];
  recent.forEach((round, i) => {
    lines.push(`Round ${history.roundCount - i}:`);
    for (const s of round) {
      lines.push(`- ${s.isLie ? 'LIE' : 'TRUTH'}: ${s.text}`);
    }
  });
  lines.push('');
  lines.push(
    `IMPORTANT: You've now seen ${recent.length} previous rounds. ` +
      "Please generate completely new statements that don't overlap with ANY previous topics or facts."
  );
  return lines.join('\n');
}

export function buildRoundPrompt(basePrompt: string, history: History): RoundPrompt {
  const roundNumber = history.roundCount + 1;
  const isEasterEggSet = isEasterEggRound(roundNumber);
  const egg = isEasterEggSet ? easterEggInstruction(roundNumber) : '';
  const historyContext = renderHistoryContext(history);

  const fullPrompt = historyContext
    ? `${basePrompt}\n\n${historyContext}\n\nIMPORTANT: DO NOT repeat any of the facts or topics above. ` +
      `This is round ${roundNumber}, so ensure complete variety.${egg}`
    : `${basePrompt}\n\nThis is round ${roundNumber}.${egg}`;

  return { roundNumber, historyContext, fullPrompt, isEasterEggSet };
}
