import { describe, it, expect, vi } from 'vitest';
import type { ResearchConfig } from '@scholar/schemas/src/research-config.schema.js';
import {
  LlmError,
  PipelineError,
  SchemaValidationError,
} from '@scholar/shared/src/utils/errors.js';
import type { TextLlmClient, TextLlmRequest } from '../llm/text-llm-client.js';
import type { LlmClient } from '../llm/llm-client.js';
import { ANSWER_WRITER_ROLE, SOURCE_CONDENSER_ROLE } from '../llm/prompt-markers.js';
import {
  createEchoTextLlm,
  createPlannerLlm,
  createStubSearch,
  invokeCount,
  searchCount,
  writtenAnswer,
} from '../testing/stub-providers.js';
import { createPipeline } from './pipeline.js';

const QUESTION = 'Who is older? Point guards or Centers?';

const researchConfig: ResearchConfig = {
  maxQueries: 3,
  concurrency: 3,
  maxSourceChars: 2000,
  maxSummaryChars: 6000,
  requestTimeoutMs: 1000,
  reportType: 'research_report',
};

function sectionFor(query: string): string {
  return `Query: ${query}\nSources: https://example.com/${encodeURIComponent(query)}\nSummary: [${query}] Notes on ${query}`;
}

function createProviders(planQueries: (question: string) => string[] = () => ['point guard age', 'center age']) {
  return {
    llmClient: createPlannerLlm(planQueries),
    textLlmClient: createEchoTextLlm(),
    webSearchClient: createStubSearch((query) => `Notes on ${query}`),
  };
}

describe('createPipeline', () => {
  it('should answer the smoke question from the collected research', async () => {
    const pipeline = createPipeline({ ...createProviders(), researchConfig });

    const result = await pipeline.run({ question: QUESTION });

    const summary = `${sectionFor('point guard age')}\n\n${sectionFor('center age')}`;
    expect(result.status).toBe('done');
    expect(result.answer.text).toBe(writtenAnswer(QUESTION, summary));
    expect(result.answer.text).toContain('Point guards');
    expect(result.answer.text).toContain('Centers');
    expect(result.context).toEqual({
      question: QUESTION,
      researchSummary: summary,
      searchQueries: ['point guard age', 'center age'],
      sources: ['https://example.com/point%20guard%20age', 'https://example.com/center%20age'],
    });
  });

  it('should reject an empty question before any provider call', async () => {
    const providers = createProviders();
    const pipeline = createPipeline({ ...providers, researchConfig });

    await expect(pipeline.run({ question: '' })).rejects.toThrow(SchemaValidationError);
    await expect(pipeline.run({})).rejects.toThrow(SchemaValidationError);

    expect(invokeCount(providers.llmClient)).toBe(0);
    expect(invokeCount(providers.textLlmClient)).toBe(0);
    expect(searchCount(providers.webSearchClient)).toBe(0);
  });

  it('should still reach done when every search fails', async () => {
    const pipeline = createPipeline({
      llmClient: createPlannerLlm(() => ['point guard age', 'center age']),
      textLlmClient: createEchoTextLlm(),
      webSearchClient: createStubSearch(() => new Error('getaddrinfo ENOTFOUND')),
      researchConfig,
    });

    const result = await pipeline.run({ question: QUESTION });

    expect(result.status).toBe('done');
    expect(result.answer.text).toBe(writtenAnswer(QUESTION, ''));
    expect(result.context.researchSummary).toBe('');
    expect(result.context.sources).toEqual([]);
  });

  it('should keep the question identical across independent runs', async () => {
    const pipeline = createPipeline({ ...createProviders(), researchConfig });

    const first = await pipeline.run({ question: QUESTION });
    const second = await pipeline.run({ question: QUESTION });

    expect(first.context.question).toBe(QUESTION);
    expect(second.context.question).toBe(first.context.question);
    expect(second.context.researchSummary).toBe(first.context.researchSummary);
  });

  it('should not share research between concurrent runs', async () => {
    const pipeline = createPipeline({
      ...createProviders((question) => [`${question} history`]),
      researchConfig,
    });
    const telescope = 'Who invented the telescope?';
    const mountain = 'What is the tallest mountain?';

    const [first, second] = await Promise.all([
      pipeline.run({ question: telescope }),
      pipeline.run({ question: mountain }),
    ]);

    expect(first.answer.text).toBe(writtenAnswer(telescope, sectionFor(`${telescope} history`)));
    expect(second.answer.text).toBe(writtenAnswer(mountain, sectionFor(`${mountain} history`)));
    expect(first.context.searchQueries).toEqual([`${telescope} history`]);
    expect(second.context.searchQueries).toEqual([`${mountain} history`]);
  });

  it('should wrap a writer generation failure in a PipelineError for the writer stage', async () => {
    const echo = createEchoTextLlm();
    const textLlmClient: TextLlmClient = {
      invoke: vi.fn().mockImplementation((request: TextLlmRequest) =>
        request.systemPrompt.includes(ANSWER_WRITER_ROLE)
          ? Promise.reject(new LlmError('Answer generation failed: quota exhausted', false))
          : echo.invoke(request),
      ),
    };
    const pipeline = createPipeline({
      llmClient: createPlannerLlm(() => ['center age']),
      textLlmClient,
      webSearchClient: createStubSearch((query) => `Notes on ${query}`),
      researchConfig,
    });

    const error: unknown = await pipeline.run({ question: QUESTION }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) {
      expect(error.stage).toBe('writer');
      expect(error.cause).toBeInstanceOf(LlmError);
      expect(error.message).toBe('Writer stage failed: Answer generation failed: quota exhausted');
    }
  });

  it('should fail the research stage when the condensing model is unavailable', async () => {
    const echo = createEchoTextLlm();
    const textLlmClient: TextLlmClient = {
      invoke: vi.fn().mockImplementation((request: TextLlmRequest) =>
        request.systemPrompt.includes(SOURCE_CONDENSER_ROLE)
          ? Promise.reject(
              new LlmError('Vertex AI text invocation failed: 503 service unavailable', false),
            )
          : echo.invoke(request),
      ),
    };
    const pipeline = createPipeline({
      llmClient: createPlannerLlm(() => ['center age']),
      textLlmClient,
      webSearchClient: createStubSearch((query) => `Notes on ${query}`),
      researchConfig,
    });

    const error: unknown = await pipeline.run({ question: QUESTION }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) {
      expect(error.stage).toBe('research');
      expect(error.cause).toBeInstanceOf(LlmError);
    }
    expect(invokeCount(echo)).toBe(0);
  });

  it('should fail the research stage when the planning model is unavailable', async () => {
    const llmClient: LlmClient = {
      invoke: vi
        .fn()
        .mockRejectedValue(new LlmError('Vertex AI invocation failed: 403 permission denied', false)),
    };
    const webSearchClient = createStubSearch((query) => `Notes on ${query}`);
    const pipeline = createPipeline({
      llmClient,
      textLlmClient: createEchoTextLlm(),
      webSearchClient,
      researchConfig,
    });

    const error: unknown = await pipeline.run({ question: QUESTION }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) {
      expect(error.stage).toBe('research');
      expect(error.message).toBe(
        'Research stage failed: Vertex AI invocation failed: 403 permission denied',
      );
    }
    expect(searchCount(webSearchClient)).toBe(0);
  });

  it('should use the configured report type in the writer prompt', async () => {
    const providers = createProviders();
    const pipeline = createPipeline({
      ...providers,
      researchConfig: { ...researchConfig, reportType: 'outline_report' },
    });

    await pipeline.run({ question: QUESTION });

    const writerCall = vi
      .mocked(providers.textLlmClient.invoke)
      .mock.calls.find(([request]) => request.systemPrompt.includes(ANSWER_WRITER_ROLE));
    expect(writerCall?.[0].systemPrompt).toContain('outline');
  });
});
