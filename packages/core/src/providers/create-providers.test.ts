import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigurationError } from '@scholar/shared/src/utils/errors.js';
import { createResearchProviders, isMockMode } from './create-providers.js';

describe('createResearchProviders', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['SCHOLAR_GCP_PROJECT_ID'];
    delete process.env['GCP_PROJECT_ID'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should build in-process clients in mock mode', async () => {
    process.env['SCHOLAR_MOCK_LLM'] = 'true';

    const providers = await createResearchProviders();
    const result = await providers.webSearchClient.search('center age');

    expect(isMockMode()).toBe(true);
    expect(result.content).toBe('Mock web search results about center age.');
    expect(result.sourceUrls).toEqual(['https://example.com/source1', 'https://example.com/source2']);
  });

  it('should require a project id outside mock mode', async () => {
    process.env['SCHOLAR_MOCK_LLM'] = 'false';

    await expect(createResearchProviders()).rejects.toThrow(ConfigurationError);
  });
});
