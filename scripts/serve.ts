/**
 * TubeBrief — Trigger Server Entry Point
 *
 * Run with: npm run server
 */

import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/lib/config';
import { createPipeline } from '../src/app';
import { checkDatabaseHealth } from '../src/db/client';
import { createTriggerApp, startTriggerServer } from '../src/server/trigger';

async function serve(): Promise<void> {
  const config = loadConfig();

  if (!config.trigger.secret) {
    console.error('ERROR: TRIGGER_SECRET environment variable is required');
    process.exit(1);
  }

  const { client, orchestrator, ledger, archive } = createPipeline(config);

  const health = await checkDatabaseHealth(client);
  if (!health.healthy) {
    logger.error('Database unreachable', { error: health.error });
    process.exit(1);
  }
  logger.info('Database reachable', { latencyMs: health.latencyMs });
  const app = createTriggerApp({
    orchestrator,
    ledger,
    archive,
    secret: config.trigger.secret,
  });

  await startTriggerServer(app, config.trigger.port);
  console.log('Endpoints:');
  console.log('  GET  /health     - Health check');
  console.log('  POST /cycles     - Run one cycle (signed)');
  console.log('  GET  /summaries  - Latest processed videos');
}

serve().catch(error => {
  logger.error('Trigger server failed to start', { error: errorMessage(error) });
  process.exit(1);
});
