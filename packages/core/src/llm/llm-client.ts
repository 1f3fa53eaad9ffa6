import { createChildLogger } from '@scholar/shared/src/logger.js';
import { ConfigurationError } from '@scholar/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';
import { QUERY_PLANNER_ROLE, readQuestionLine } from './prompt-markers.js';
import { retryOnTransientError } from './transient-retry.js';

const log = createChildLogger('llm:client');

export const DEFAULT_MODEL = 'gemini-2.0-flash';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

/** Appends the expected JSON Schema, when the request carries one, to the system prompt. */
export function buildJsonSystemPrompt(request: LlmRequest): string {
  if (!request.jsonSchema) {
    return request.systemPrompt;
  }
  return `${request.systemPrompt}\n\nThe response must be JSON that validates against this JSON Schema:\n${JSON.stringify(request.jsonSchema)}`;
}

function createMockResponse(request: LlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();

  if (prompt.includes(QUERY_PLANNER_ROLE)) {
    const question = readQuestionLine(request.userMessage);
    return JSON.stringify({
      queries: [question, `${question} statistics`, `${question} expert analysis`],
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

export function resolveProjectId(): string | undefined {
  return process.env['SCHOLAR_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
}

export function resolveModelName(): string {
  return process.env['SCHOLAR_LLM_MODEL'] ?? DEFAULT_MODEL;
}

async function createVertexClient(): Promise<LlmClient> {
  const projectId = resolveProjectId();
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'us-central1';

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: resolveModelName(),
    location,
    temperature: 0.2,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      return retryOnTransientError(
        async () => {
          const response = await model.invoke([
            ['system', buildJsonSystemPrompt(request)],
            ['human', request.userMessage],
          ]);

          const rawContent =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          // Re-serialize so callers always receive bare JSON
          const content = JSON.stringify(extractJson(rawContent));

          return {
            content,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        },
        { operationName: 'Vertex AI invocation', log },
      );
    },
  };
}

export async function createLlmClient(): Promise<LlmClient> {
  if (process.env['SCHOLAR_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient();
}
