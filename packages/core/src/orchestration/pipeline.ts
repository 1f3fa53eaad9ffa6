import { StateGraph, START, END } from '@langchain/langgraph';
import type { PipelineResult, ResearchContext } from '@scholar/shared/src/types/research.types.js';
import type { ResearchConfig } from '@scholar/schemas/src/research-config.schema.js';
import { validateResearchRequest } from '@scholar/schemas/src/validators.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { AgentError, PipelineError } from '@scholar/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { TextLlmClient } from '../llm/text-llm-client.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createResearchSummarizer } from '../services/research/research-summarizer.js';
import { createAnswerWriter } from '../services/writer/answer-writer.js';
import { PipelineGraphAnnotation, type PipelineGraphState } from './pipeline-state.js';
import { createResearchNode, createWriterNode } from './stage-nodes.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineConfig {
  readonly llmClient: LlmClient;
  readonly textLlmClient: TextLlmClient;
  readonly webSearchClient: WebSearchClient;
  readonly researchConfig: ResearchConfig;
}

export interface Pipeline {
  /** Validates `request` and answers its question. Rejects with `PipelineError` on stage failure. */
  run(request: unknown): Promise<PipelineResult>;
}

function toContext(state: PipelineGraphState, question: string): ResearchContext {
  return {
    question: state.question ?? question,
    researchSummary: state.researchSummary,
    searchQueries: state.searchQueries,
    sources: state.sources,
  };
}

export function createPipeline(config: PipelineConfig): Pipeline {
  const { researchConfig } = config;

  log.info(
    {
      reportType: researchConfig.reportType,
      maxQueries: researchConfig.maxQueries,
      concurrency: researchConfig.concurrency,
    },
    'Initializing research pipeline',
  );

  const researchStage = createResearchSummarizer(
    {
      llmClient: config.llmClient,
      textLlmClient: config.textLlmClient,
      webSearchClient: config.webSearchClient,
    },
    researchConfig,
  );
  const answerWriter = createAnswerWriter(config.textLlmClient, {
    reportType: researchConfig.reportType,
    requestTimeoutMs: researchConfig.requestTimeoutMs,
  });

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode('research', createResearchNode(researchStage))
    .addNode('writer', createWriterNode(answerWriter))
    .addEdge(START, 'research')
    .addEdge('research', 'writer')
    .addEdge('writer', END)
    .compile();

  return {
    async run(request: unknown): Promise<PipelineResult> {
      const { question } = validateResearchRequest(request);

      log.info({ questionLength: question.length }, 'Running research pipeline');

      let state: PipelineGraphState;
      try {
        state = await graph.invoke({ question });
      } catch (error) {
        if (error instanceof PipelineError) {
          log.error({ stage: error.stage, error: error.message }, 'Pipeline failed');
          throw error;
        }
        const cause = error instanceof Error ? error : new Error(String(error));
        log.error({ error: cause.message }, 'Pipeline failed outside a stage');
        throw new PipelineError(`Pipeline failed: ${cause.message}`, 'orchestration', cause);
      }

      if (state.status !== 'done' || state.answer === undefined) {
        throw new PipelineError(
          `Pipeline stopped in status "${state.status}" without an answer`,
          'orchestration',
          new AgentError('Missing final answer'),
        );
      }

      log.info(
        { answerLength: state.answer.text.length, sourceCount: state.sources?.length ?? 0 },
        'Pipeline complete',
      );

      return {
        answer: state.answer,
        context: toContext(state, question),
        status: state.status,
      };
    },
  };
}
