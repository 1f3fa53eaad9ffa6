import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { createPipeline } from '@scholar/core/src/orchestration/pipeline.js';
import { createResearchProviders } from '@scholar/core/src/providers/create-providers.js';
import { loadResearchConfig } from '@scholar/schemas/src/config-loader.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configPath =
    process.env['SCHOLAR_CONFIG_PATH'] ?? resolve(process.cwd(), 'config', 'research.json');

  const researchConfig = await loadResearchConfig(configPath);
  const providers = await createResearchProviders();
  const pipeline = createPipeline({ ...providers, researchConfig });

  const app = createApp({ pipeline });

  log.info({ port, configPath }, 'Starting Scholar API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Scholar API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
