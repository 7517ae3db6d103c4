/**
 * @fileoverview Express server entry point for the crew orchestrator.
 *
 * Validates configuration, wires the orchestration services and serves
 * the JSON API. On shutdown, running tasks are drained before the store
 * is closed.
 */

import config, { validateConfig } from './config.js';
import { initObservability, createLogger } from './utils/observability/index.js';
import { createApp } from './app.js';
import { createCrewRuntime } from './services/crew-runtime.js';
import { closeStore } from './services/store/index.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });

const runtime = createCrewRuntime();
const app = createApp(runtime);

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    oracleModel: config.oracle.model,
    agentFailurePolicy: config.orchestrator.agentFailurePolicy,
    maxIterations: config.orchestrator.maxIterations,
  });
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal, activeRuns: runtime.runner.activeCount });

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { activeRuns: runtime.runner.activeCount });
    process.exit(1);
  }, 30_000);

  // Stop accepting requests, then let in-flight runs reach a terminal status
  server.close();
  await runtime.runner.drain();
  closeStore();

  clearTimeout(forceExitTimer);
  logger.info('server_closed');
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
