import { createChildLogger } from '@scholar/shared/src/logger.js';
import { createLlmClient, resolveModelName, resolveProjectId, type LlmClient } from '../llm/llm-client.js';
import { createTextLlmClient, type TextLlmClient } from '../llm/text-llm-client.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import { createWebSearchClient } from '../services/web-search/web-search-client.js';
import type { WebSearchClient } from '../services/web-search/types.js';

const log = createChildLogger('providers');

export interface ResearchProviders {
  readonly llmClient: LlmClient;
  readonly textLlmClient: TextLlmClient;
  readonly webSearchClient: WebSearchClient;
}

export function isMockMode(): boolean {
  return process.env['SCHOLAR_MOCK_LLM'] === 'true';
}

/**
 * Builds the three provider clients from the environment. With
 * `SCHOLAR_MOCK_LLM=true` every client runs in process.
 */
export async function createResearchProviders(): Promise<ResearchProviders> {
  const llmClient = await createLlmClient();
  const textLlmClient = await createTextLlmClient();

  const webSearchClient = isMockMode()
    ? createMockWebSearchClient()
    : createWebSearchClient({
        projectId: resolveProjectId() ?? '',
        location: process.env['VERTEX_AI_LOCATION'] ?? 'us-central1',
        model: resolveModelName(),
      });

  log.info({ mock: isMockMode() }, 'Research providers ready');

  return { llmClient, textLlmClient, webSearchClient };
}
