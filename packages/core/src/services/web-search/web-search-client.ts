import { createChildLogger } from '@scholar/shared/src/logger.js';
import { ConfigurationError } from '@scholar/shared/src/utils/errors.js';
import { DEFAULT_MODEL } from '../../llm/llm-client.js';
import { retryOnTransientError } from '../../llm/transient-retry.js';
import type { WebSearchClient, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:client');

export interface WebSearchClientConfig {
  readonly projectId: string;
  readonly location: string;
  readonly model?: string;
}

interface GroundingChunk {
  readonly web?: {
    readonly uri?: string;
  };
}

interface GroundingMetadata {
  readonly groundingChunks?: readonly GroundingChunk[];
}

interface GenAiCandidate {
  readonly groundingMetadata?: GroundingMetadata;
}

interface GenAiResponse {
  readonly candidates?: readonly GenAiCandidate[];
}

export function extractSourceUrls(response: GenAiResponse): string[] {
  const urls: string[] = [];
  for (const candidate of response.candidates ?? []) {
    for (const chunk of candidate.groundingMetadata?.groundingChunks ?? []) {
      if (chunk.web?.uri) {
        urls.push(chunk.web.uri);
      }
    }
  }
  return [...new Set(urls)];
}

export function buildSearchPrompt(query: string, systemContext?: string): string {
  const instruction = `Search the web for the following query and report what the top results say, including concrete facts, numbers and dates:\n${query}`;
  return systemContext ? `${systemContext}\n\n${instruction}` : instruction;
}

export function createWebSearchClient(config: WebSearchClientConfig): WebSearchClient {
  const { projectId, location, model = DEFAULT_MODEL } = config;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for WebSearchClient');
  }

  log.info({ projectId, location, model }, 'Creating web search client');

  return {
    async search(query: string, systemContext?: string): Promise<WebSearchResult> {
      log.debug({ query }, 'Executing web search');

      const { GoogleGenAI } = await import('@google/genai');

      const client = new GoogleGenAI({
        vertexai: true,
        project: projectId,
        location,
      });

      const response = await retryOnTransientError(
        () =>
          client.models.generateContent({
            model,
            contents: buildSearchPrompt(query, systemContext),
            config: {
              tools: [{ googleSearch: {} }],
            },
          }),
        { operationName: 'Web search', log },
      );

      const content = response.text ?? '';
      const sourceUrls = extractSourceUrls(response);

      log.debug({ query, sourceCount: sourceUrls.length }, 'Web search completed');

      return { query, content, sourceUrls };
    },
  };
}
