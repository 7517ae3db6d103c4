import express from 'express';
import { healthHandler } from './routes/health.js';
import { createApiRouter } from './routes/api.js';
import type { CrewRuntime } from './services/crew-runtime.js';

/**
 * Build the Express app without listening, so tests can mount it too.
 */
export function createApp(runtime: CrewRuntime): express.Application {
  const app = express();

  app.get('/health', healthHandler);

  app.use(createApiRouter({
    store: runtime.store,
    cache: runtime.cache,
    runner: runtime.runner,
  }));

  return app;
}
