import { resolve } from 'node:path';
import { loadResearchConfig } from '@scholar/schemas/src/config-loader.js';
import { createPipeline } from '@scholar/core/src/orchestration/pipeline.js';
import { createResearchProviders, isMockMode } from '@scholar/core/src/providers/create-providers.js';

async function main(): Promise<void> {
  const question = process.argv[2] ?? 'Who is older? Point guards or Centers?';
  const configPath = process.argv[3] ?? resolve(process.cwd(), 'config', 'research.json');

  console.log('=== Scholar Research Runner ===\n');
  console.log(`Config file: ${configPath}`);
  console.log(`Question: ${question}`);
  console.log(`Mock LLM: ${isMockMode() ? 'yes' : 'no'}\n`);

  const startTime = Date.now();

  const researchConfig = await loadResearchConfig(configPath);
  console.log(
    `Report type: ${researchConfig.reportType} (up to ${String(researchConfig.maxQueries)} queries)\n`,
  );

  const providers = await createResearchProviders();
  const pipeline = createPipeline({ ...providers, researchConfig });

  console.log('Running pipeline...\n');
  const result = await pipeline.run({ question });
  const elapsed = Date.now() - startTime;

  console.log('--- Search Queries ---');
  for (const query of result.context.searchQueries ?? []) {
    console.log(`  - ${query}`);
  }

  console.log('\n--- Sources ---');
  const sources = result.context.sources ?? [];
  if (sources.length === 0) {
    console.log('  (none)');
  }
  for (const source of sources) {
    console.log(`  - ${source}`);
  }

  console.log('\n--- Answer ---');
  console.log(result.answer.text);

  console.log(`\nCompleted in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Pipeline failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
