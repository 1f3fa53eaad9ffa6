import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildJsonSystemPrompt, createLlmClient } from './llm-client.js';
import { createTextLlmClient } from './text-llm-client.js';
import { ANSWER_WRITER_ROLE, QUERY_PLANNER_ROLE, SOURCE_CONDENSER_ROLE } from './prompt-markers.js';

const { vertexInvoke } = vi.hoisted(() => ({ vertexInvoke: vi.fn() }));

vi.mock('@langchain/google-vertexai', () => ({
  ChatVertexAI: class {
    invoke = vertexInvoke;
  },
}));

describe('buildJsonSystemPrompt', () => {
  it('should leave the prompt unchanged without a schema', () => {
    expect(buildJsonSystemPrompt({ systemPrompt: 'Plan.', userMessage: 'Q' })).toBe('Plan.');
  });

  it('should append the schema as compact JSON', () => {
    expect(
      buildJsonSystemPrompt({
        systemPrompt: 'Plan.',
        userMessage: 'Q',
        jsonSchema: { type: 'object', required: ['queries'] },
      }),
    ).toBe(
      'Plan.\n\nThe response must be JSON that validates against this JSON Schema:\n{"type":"object","required":["queries"]}',
    );
  });
});

describe('createLlmClient', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('mock mode', () => {
    beforeEach(() => {
      process.env['SCHOLAR_MOCK_LLM'] = 'true';
    });

    it('should plan queries from the question line', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({
        systemPrompt: `You are a ${QUERY_PLANNER_ROLE}.`,
        userMessage: 'Question: Why is the sky blue?\nMaximum queries: 3',
      });

      expect(JSON.parse(response.content)).toEqual({
        queries: [
          'Why is the sky blue?',
          'Why is the sky blue? statistics',
          'Why is the sky blue? expert analysis',
        ],
      });
    });

    it('should return a generic JSON payload for other prompts', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({ systemPrompt: 'Other', userMessage: 'Input' });

      expect(JSON.parse(response.content)).toEqual({ result: 'Mock LLM response' });
    });

    it('should include token usage in the response', async () => {
      const client = await createLlmClient();
      const response = await client.invoke({ systemPrompt: 'Test', userMessage: 'Input' });

      expect(response.tokenUsage).toEqual({ input: 100, output: 50 });
    });
  });

  describe('vertex mode', () => {
    it('should throw ConfigurationError when no project is configured', async () => {
      delete process.env['SCHOLAR_MOCK_LLM'];
      delete process.env['GCP_PROJECT_ID'];
      delete process.env['SCHOLAR_GCP_PROJECT_ID'];

      await expect(createLlmClient()).rejects.toThrow('GCP_PROJECT_ID');
    });

    it('should send the response schema to the model with the system prompt', async () => {
      delete process.env['SCHOLAR_MOCK_LLM'];
      process.env['GCP_PROJECT_ID'] = 'test-project';
      vertexInvoke.mockResolvedValue({ content: '```json\n{"queries":["center age"]}\n```' });
      const jsonSchema = { type: 'object', properties: { queries: { type: 'array' } } };

      const client = await createLlmClient();
      const response = await client.invoke({ systemPrompt: 'Plan.', userMessage: 'Q', jsonSchema });

      expect(vertexInvoke).toHaveBeenCalledWith([
        ['system', buildJsonSystemPrompt({ systemPrompt: 'Plan.', userMessage: 'Q', jsonSchema })],
        ['human', 'Q'],
      ]);
      expect(response.content).toBe('{"queries":["center age"]}');
    });
  });
});

describe('createTextLlmClient', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, SCHOLAR_MOCK_LLM: 'true' };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should condense sources with a finding that names the question', async () => {
    const client = await createTextLlmClient();
    const response = await client.invoke({
      systemPrompt: `You are a ${SOURCE_CONDENSER_ROLE}.`,
      userMessage: 'Question: How tall is Everest?\n\nSearch results:\nabout 8849 m',
    });

    expect(response.content).toBe(
      'Search results relevant to "How tall is Everest?" were condensed into this mock finding.',
    );
  });

  it('should write an answer headed by the question', async () => {
    const client = await createTextLlmClient();
    const response = await client.invoke({
      systemPrompt: `You are a ${ANSWER_WRITER_ROLE}.`,
      userMessage: 'Question: How tall is Everest?',
    });

    expect(response.content.startsWith('## How tall is Everest?')).toBe(true);
  });

  it('should throw when no project is configured outside mock mode', async () => {
    delete process.env['SCHOLAR_MOCK_LLM'];
    delete process.env['GCP_PROJECT_ID'];
    delete process.env['SCHOLAR_GCP_PROJECT_ID'];

    await expect(createTextLlmClient()).rejects.toThrow('GCP_PROJECT_ID');
  });
});
