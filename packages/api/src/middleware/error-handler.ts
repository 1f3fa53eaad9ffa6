import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  AgentError,
  LlmError,
  PipelineError,
  SchemaValidationError,
  TimeoutError,
} from '@scholar/shared/src/utils/errors.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

function isGenerationFailure(err: Error | undefined): boolean {
  return err instanceof LlmError || err instanceof AgentError;
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'BAD_REQUEST',
      requestId,
    };
    return c.json(body, err.status);
  }

  const stage = err instanceof PipelineError ? err.stage : undefined;
  // Orchestration faults are internal whatever their cause.
  const cause =
    stage === 'orchestration' ? undefined : err instanceof PipelineError ? err.cause : err;

  if (cause instanceof TimeoutError) {
    log.error({ requestId, stage, error: err.message }, 'Research timed out');
    const body: ErrorResponse = {
      error: 'Research timed out',
      code: 'TIMEOUT',
      requestId,
    };
    return c.json(body, 504);
  }

  if (isGenerationFailure(cause)) {
    log.error({ requestId, stage, error: err.message }, 'Answer generation failed');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'GENERATION_FAILED',
      requestId,
    };
    return c.json(body, 502);
  }

  log.error({ requestId, stage, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
