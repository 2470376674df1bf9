import { z } from 'zod';

export const StatementSchema = z.object({
  text: z.string().min(1),
  isLie: z.boolean(),
  explanation: z.string(),
});

export type Statement = z.infer<typeof StatementSchema>;

/** One round: three statements, exactly one of them a lie. */
export const RoundStatementsSchema = z
  .array(StatementSchema)
  .length(3)
  .refine(statements => statements.filter(s => s.isLie).length === 1, {
    message: 'a round must contain exactly one lie',
  });

export type Round = z.infer<typeof RoundStatementsSchema>;

/** Shape the model is asked to produce. Extra top-level fields are ignored. */
export const RoundPayloadSchema = z.object({
  statements: RoundStatementsSchema,
});

export type RoundPayload = z.infer<typeof RoundPayloadSchema>;

export type History = {
  roundCount: number;
  /** Most recent first. */
  rounds: Round[];
};

export const PromptLogEntrySchema = z.object({
  round_number: z.number().int(),
  prompt: z.string(),
  history_context: z.string().nullable(),
  full_prompt: z.string(),
  is_easter_egg_set: z.boolean(),
  timestamp: z.string(),
});

export type PromptLogEntry = z.infer<typeof PromptLogEntrySchema>;

export const ResponseLogEntrySchema = z.object({
  round_number: z.number().int(),
  response: z.string(),
  timestamp: z.string(),
});

export type ResponseLogEntry = z.infer<typeof ResponseLogEntrySchema>;

/** Every third round carries the easter-egg instruction. */
export function isEasterEggRound(roundNumber: number): boolean {
  return roundNumber % 3 === 0;
}
