import { vi } from 'vitest';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Pipeline } from '@scholar/core/src/orchestration/pipeline.js';
import type { PipelineResult } from '@scholar/shared/src/types/research.types.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

/**
 * App wired to a fake pipeline. `outcome` is either the result to resolve
 * with or the error to reject with.
 */
export function createTestApp(outcome: PipelineResult | Error): {
  app: OpenAPIHono<AppEnv>;
  pipeline: Pipeline;
} {
  const pipeline: Pipeline = {
    run: vi
      .fn()
      .mockImplementation(() =>
        outcome instanceof Error ? Promise.reject(outcome) : Promise.resolve(outcome),
      ),
  };

  return { app: createApp({ pipeline }), pipeline };
}

export function jsonPost(body: Record<string, unknown>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
