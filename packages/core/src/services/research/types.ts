import type { ResearchFindings } from '@scholar/shared/src/types/research.types.js';
import type { ResearchConfig } from '@scholar/schemas/src/research-config.schema.js';
import type { LlmClient } from '../../llm/llm-client.js';
import type { TextLlmClient } from '../../llm/text-llm-client.js';
import type { WebSearchClient } from '../web-search/types.js';

export interface ResearchStageDeps {
  readonly llmClient: LlmClient;
  readonly textLlmClient: TextLlmClient;
  readonly webSearchClient: WebSearchClient;
}

export type ResearchStageConfig = Pick<
  ResearchConfig,
  'maxQueries' | 'concurrency' | 'maxSourceChars' | 'maxSummaryChars' | 'requestTimeoutMs'
>;

export interface QueryFinding {
  readonly query: string;
  readonly summary: string;
  readonly sourceUrls: readonly string[];
}

export interface WebResearchStage {
  /**
   * Research summary for `question`; `''` when nothing usable was found.
   * Rejects with `LlmError` when the planning or condensing model is unavailable.
   */
  summarizeResearch(question: string): Promise<string>;
  gatherFindings(question: string): Promise<ResearchFindings>;
}
