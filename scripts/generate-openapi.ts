import { createApp, OPENAPI_INFO } from '../packages/api/src/app.js';
import { PipelineError } from '../packages/shared/src/utils/errors.js';

// Only the route definitions are read; the pipeline is never run.
const app = createApp({
  pipeline: {
    run: () =>
      Promise.reject(new PipelineError('Pipeline is not available here', 'orchestration')),
  },
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: OPENAPI_INFO,
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
