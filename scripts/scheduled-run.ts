/**
 * TubeBrief — Scheduled Run Script
 *
 * Keeps running cycles at a fixed interval until interrupted. For cron or a
 * workflow scheduler, call `npm run cycle` instead.
 *
 * Usage:
 *   npm run scheduled                      # Every 60 minutes
 *   npm run scheduled -- --interval 15     # Every 15 minutes
 *
 * The first Ctrl-C cancels the running cycle after the current video and
 * stops the loop. A second one exits immediately.
 */

import { logger } from '../src/lib/logger';
import { CycleInProgressError, errorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/lib/config';
import { createPipeline } from '../src/app';
import { buildDigest } from '../src/digest/digest';

const DEFAULT_INTERVAL_MINUTES = 60;

function parseInterval(): number {
  const args = process.argv.slice(2);
  const index = args.indexOf('--interval');
  const value = index >= 0 ? Number(args[index + 1]) : DEFAULT_INTERVAL_MINUTES;
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_INTERVAL_MINUTES;
}

async function scheduledRun(): Promise<void> {
  const intervalMinutes = parseInterval();
  const config = loadConfig();
  const { orchestrator, archive } = createPipeline(config);

  let stopping = false;
  let wake: (() => void) | undefined;

  process.on('SIGINT', () => {
    if (stopping) {
      process.exit(130);
    }
    stopping = true;
    orchestrator.cancel();
    wake?.();
    logger.info('Stopping after the current video');
  });

  logger.info('Scheduler started', { intervalMinutes });

  while (!stopping) {
    try {
      const run = await orchestrator.runCycle();
      const digest = buildDigest(run.records, run.finishedAt);
      if (digest.count > 0) {
        await archive.archive(digest, run.runId);
      }
    } catch (error) {
      if (!(error instanceof CycleInProgressError)) {
        logger.error('Scheduled cycle failed', { error: errorMessage(error) });
      }
    }

    if (stopping) break;

    await new Promise<void>(resolve => {
      const timer = setTimeout(resolve, intervalMinutes * 60 * 1000);
      wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
    wake = undefined;
  }

  logger.info('Scheduler stopped');
}

scheduledRun().catch(error => {
  logger.error('Scheduler failed', { error: errorMessage(error) });
  process.exit(1);
});
