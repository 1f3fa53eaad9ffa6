import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Pipeline } from '@scholar/core/src/orchestration/pipeline.js';
import type { PipelineResult } from '@scholar/shared/src/types/research.types.js';
import { createRouter, type AppEnv } from '../types.js';
import { ResearchRequestBodySchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ResearchResponseSchema,
  type ResearchResponse,
} from '../schemas/responses.js';

const researchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Research'],
  summary: 'Research a question on the web and write an answer',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ResearchRequestBodySchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Written answer with the research it was based on',
      content: {
        'application/json': {
          schema: ResearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    502: {
      description: 'Answer generation failed',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    504: {
      description: 'Research timed out',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

function toResponse(result: PipelineResult): ResearchResponse {
  const { context } = result;
  return {
    answer: { text: result.answer.text },
    status: result.status,
    context: {
      question: context.question,
      researchSummary: context.researchSummary,
      searchQueries: context.searchQueries ? [...context.searchQueries] : undefined,
      sources: context.sources ? [...context.sources] : undefined,
    },
  };
}

export function createResearchRoutes(pipeline: Pipeline): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(researchRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await pipeline.run(body);
    return c.json(toResponse(result), 200);
  });

  return routes;
}
