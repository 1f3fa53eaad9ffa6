import { z } from '@hono/zod-openapi';

export const ResearchRequestBodySchema = z
  .object({
    question: z.string().min(1).openapi({ example: 'Who is older? Point guards or Centers?' }),
  })
  .openapi('ResearchRequest');

