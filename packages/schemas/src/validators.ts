import type { ZodError } from 'zod';
import { SchemaValidationError } from '@scholar/shared/src/utils/errors.js';
import type { ResearchRequest } from '@scholar/shared/src/types/research.types.js';
import { ResearchRequestSchema } from './research-request.schema.js';
import { ResearchConfigSchema } from './research-config.schema.js';
import type { ResearchConfig } from './research-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateResearchRequest(data: unknown): ResearchRequest {
  const result = ResearchRequestSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research request', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateResearchConfig(data: unknown): ResearchConfig {
  const result = ResearchConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research configuration', formatZodErrors(result.error));
  }

  return result.data;
}
