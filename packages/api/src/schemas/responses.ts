import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const HealthResponseSchema = z
  .object({
    status: z.literal('ok'),
    version: z.string(),
    uptimeSeconds: z.number().int().nonnegative(),
  })
  .openapi('HealthResponse');

export const ResearchContextSchema = z
  .object({
    question: z.string(),
    researchSummary: z.string().optional(),
    searchQueries: z.array(z.string()).optional(),
    sources: z.array(z.string()).optional(),
  })
  .openapi('ResearchContext');

export const ResearchResponseSchema = z
  .object({
    answer: z.object({ text: z.string() }),
    status: z.enum(['start', 'researched', 'done']),
    context: ResearchContextSchema,
  })
  .openapi('ResearchResponse');

export type ResearchResponse = z.infer<typeof ResearchResponseSchema>;
