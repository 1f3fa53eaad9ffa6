import { z } from 'zod';

const MAX_QUESTION_LENGTH = 2000;

export const ResearchRequestSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question must not be empty')
    .max(MAX_QUESTION_LENGTH, `Question must be at most ${String(MAX_QUESTION_LENGTH)} characters`),
});

