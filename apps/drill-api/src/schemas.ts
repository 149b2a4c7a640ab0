/**
 * Zod schemas for drill-api request validation.
 */

import { z } from 'zod';
import { TextStyle } from '@poker-drills/training-engine';

/** `topic` and `difficulty` are checked against the engine's names in the handler. */
export const ScenarioQuerySchema = z.object({
  topic: z.string().min(1).max(64),
  difficulty: z.string().min(1).max(32),
  style: z.nativeEnum(TextStyle).default(TextStyle.Simple),
  seed: z
    .string()
    .regex(/^\d{1,20}$/, 'seed must be a non-negative integer')
    .transform((s) => BigInt(s))
    .optional(),
});

export type ScenarioQuery = z.infer<typeof ScenarioQuerySchema>;

export const AnswerBodySchema = z.object({
  scenario_id: z.string().min(1).max(64),
  answer_id: z.string().min(1).max(8),
});

export type AnswerBody = z.infer<typeof AnswerBodySchema>;

/**
 * Format zod errors into a structured error response.
 */
export function formatZodError(error: z.ZodError): { error: string; details: z.ZodIssue[] } {
  return {
    error: 'VALIDATION_ERROR',
    details: error.issues,
  };
}
