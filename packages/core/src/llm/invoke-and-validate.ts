import type { z } from 'zod';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { AgentError } from '@scholar/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_RETRIES = 1;

export interface InvokeAndValidateOptions<T extends z.ZodTypeAny> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: T;
  readonly agentName: string;
  readonly maxRetries?: number;
}

function withCorrection(request: LlmRequest, errors: readonly string[]): LlmRequest {
  return {
    ...request,
    userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${errors.map((e) => `- ${e}`).join('\n')}`,
  };
}

/**
 * Invokes the JSON-mode client and validates the reply against `schema`,
 * re-prompting with the validation errors up to `maxRetries` times.
 * Provider errors are not retried here.
 */
export async function invokeAndValidate<T extends z.ZodTypeAny>(
  options: InvokeAndValidateOptions<T>,
): Promise<z.infer<T>> {
  const { llmClient, request, schema, agentName, maxRetries = DEFAULT_MAX_RETRIES } = options;

  let lastErrors: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const currentRequest = attempt === 0 ? request : withCorrection(request, lastErrors);
    const response = await llmClient.invoke(currentRequest);

    let parsed: unknown;
    try {
      parsed = extractJson(response.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      lastErrors = [`Failed to parse JSON: ${message}`];
      log.warn(
        { agentName, attempt: attempt + 1, errors: lastErrors },
        'JSON parse failed, retrying with correction',
      );
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-return
      return result.data;
    }

    lastErrors = result.error.errors.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`);

    log.warn(
      { agentName, attempt: attempt + 1, errors: lastErrors },
      'Zod validation failed, retrying with correction',
    );
  }

  throw new AgentError(
    `${agentName} returned invalid output after ${String(maxRetries + 1)} attempts: ${lastErrors.join(', ')}`,
  );
}
