import { createChildLogger } from '@scholar/shared/src/logger.js';
import { ConfigurationError } from '@scholar/shared/src/utils/errors.js';
import { resolveModelName, resolveProjectId } from './llm-client.js';
import { ANSWER_WRITER_ROLE, SOURCE_CONDENSER_ROLE, readQuestionLine } from './prompt-markers.js';
import { retryOnTransientError } from './transient-retry.js';

const log = createChildLogger('llm:text-client');

export interface TextLlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export interface TextLlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface TextLlmClient {
  invoke(request: TextLlmRequest): Promise<TextLlmResponse>;
}

function createMockText(request: TextLlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();
  const question = readQuestionLine(request.userMessage);

  if (prompt.includes(SOURCE_CONDENSER_ROLE)) {
    return `Search results relevant to "${question}" were condensed into this mock finding.`;
  }

  if (prompt.includes(ANSWER_WRITER_ROLE)) {
    return `## ${question}\n\nThis is a mock answer to "${question}" based on the collected research.\n`;
  }

  return 'This is mock prose generated for the request.';
}

function createMockTextClient(): TextLlmClient {
  log.info('Using mock text LLM client');

  return {
    invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock text LLM invocation');

      return Promise.resolve({
        content: createMockText(request),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

async function createVertexTextClient(): Promise<TextLlmClient> {
  const projectId = resolveProjectId();
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'us-central1';

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI text LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: resolveModelName(),
    location,
    temperature: 0.4,
    authOptions: { projectId },
    responseMimeType: 'text/plain',
  });

  log.info({ projectId, location }, 'Using Vertex AI text LLM client');

  return {
    async invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug(
        { systemPromptLength: request.systemPrompt.length },
        'Vertex AI text LLM invocation',
      );

      const response = await retryOnTransientError(
        () =>
          model.invoke([
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ]),
        { operationName: 'Vertex AI text invocation', log },
      );

      const content =
        typeof response.content === 'string'
          ? response.content
          : JSON.stringify(response.content);

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
  };
}

export async function createTextLlmClient(): Promise<TextLlmClient> {
  if (process.env['SCHOLAR_MOCK_LLM'] === 'true') {
    return createMockTextClient();
  }

  return createVertexTextClient();
}
