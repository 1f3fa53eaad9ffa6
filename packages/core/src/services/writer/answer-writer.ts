import type { ReportType } from '@scholar/shared/src/types/research.types.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { AgentError, SchemaValidationError } from '@scholar/shared/src/utils/errors.js';
import { withTimeout } from '@scholar/shared/src/utils/timeout.js';
import type { TextLlmClient } from '../../llm/text-llm-client.js';
import { buildWriterSystemPrompt, buildWriterUserMessage } from './report-prompts.js';

const log = createChildLogger('writer:answer');

export interface AnswerWriterConfig {
  readonly reportType: ReportType;
  readonly requestTimeoutMs: number;
}

export interface AnswerWriter {
  writeAnswer(question: string, researchSummary: string): Promise<string>;
}

export function createAnswerWriter(
  textLlmClient: TextLlmClient,
  config: AnswerWriterConfig,
): AnswerWriter {
  const systemPrompt = buildWriterSystemPrompt(config.reportType);

  return {
    async writeAnswer(question: string, researchSummary: string): Promise<string> {
      if (!question.trim()) {
        throw new SchemaValidationError('Writer requires a question', [
          'question: Question must not be empty',
        ]);
      }

      const hasResearch = researchSummary.trim().length > 0;
      log.info(
        { reportType: config.reportType, hasResearch, summaryLength: researchSummary.length },
        'Writing answer',
      );

      const response = await withTimeout(
        textLlmClient.invoke({
          systemPrompt,
          userMessage: buildWriterUserMessage(question, researchSummary),
        }),
        config.requestTimeoutMs,
        'Answer writing',
      );

      const text = response.content.trim();
      if (!text) {
        throw new AgentError('Writer returned an empty answer');
      }

      log.info({ answerLength: text.length, tokenUsage: response.tokenUsage }, 'Answer written');

      return text;
    },
  };
}
