import { createChildLogger } from '@scholar/shared/src/logger.js';
import { AgentError, PipelineError } from '@scholar/shared/src/utils/errors.js';
import type { WebResearchStage } from '../services/research/types.js';
import type { AnswerWriter } from '../services/writer/answer-writer.js';
import type { PipelineGraphState, PipelineGraphUpdate } from './pipeline-state.js';

const log = createChildLogger('orchestration:nodes');

type PipelineNode = (state: PipelineGraphState) => Promise<PipelineGraphUpdate>;

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createResearchNode(stage: WebResearchStage): PipelineNode {
  return async (state) => {
    const { question } = state;
    if (question === undefined) {
      throw new PipelineError(
        'Research stage invoked without a question',
        'research',
        new AgentError('Missing question in pipeline context'),
      );
    }

    try {
      const findings = await stage.gatherFindings(question);

      log.info(
        { queryCount: findings.queries.length, summaryLength: findings.summary.length },
        'Research attached to context',
      );

      return {
        researchSummary: findings.summary,
        searchQueries: findings.queries,
        sources: findings.sourceUrls,
        status: 'researched',
      };
    } catch (error) {
      const cause = asError(error);
      throw new PipelineError(`Research stage failed: ${cause.message}`, 'research', cause);
    }
  };
}

export function createWriterNode(writer: AnswerWriter): PipelineNode {
  return async (state) => {
    const { question, researchSummary } = state;
    if (question === undefined || researchSummary === undefined) {
      throw new PipelineError(
        'Writer stage invoked before the research summary was attached',
        'writer',
        new AgentError('Missing research summary in pipeline context'),
      );
    }

    try {
      const text = await writer.writeAnswer(question, researchSummary);
      return { answer: { text }, status: 'done' };
    } catch (error) {
      const cause = asError(error);
      throw new PipelineError(`Writer stage failed: ${cause.message}`, 'writer', cause);
    }
  };
}
