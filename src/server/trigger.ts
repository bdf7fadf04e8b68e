/**
 * TubeBrief — Trigger Server
 *
 * Minimal Express server for starting cycles from an external scheduler
 * (cron, a CI job, a hosted webhook).
 *
 * Endpoints:
 * - POST /cycles     — run one cycle (HMAC-signed)
 * - GET /summaries   — latest processed records
 * - GET /health      — health check for monitoring
 *
 * Run with: npm run server
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import crypto from 'crypto';
import { z } from 'zod';
import { logger } from '../lib/logger';
import {
  CycleAbortedError,
  CycleInProgressError,
  PersistenceError,
  errorMessage,
} from '../lib/errors';
import { buildDigest, type DigestArchive } from '../digest/digest';
import type { FeedOrchestrator } from '../orchestrator';
import type { DedupLedger } from '../ledger/dedup-ledger';
import type { CycleRun } from '../types';

const log = logger.child({ component: 'trigger-server' });

export const SIGNATURE_HEADER = 'x-tubebrief-signature';

// ============================================================
// SIGNATURE VERIFICATION
// ============================================================

/**
 * Verify an HMAC SHA-256 signature of the form "sha256=<hex>".
 */
export function verifySignature(
  payload: string,
  signature: string | undefined,
  secret: string
): boolean {
  if (!signature) {
    return false;
  }

  const parts = signature.split('=');
  if (parts.length !== 2 || parts[0] !== 'sha256' || !parts[1]) {
    return false;
  }

  const expected = crypto.createHmac('sha256', secret).update(payload).digest();
  const received = Buffer.from(parts[1], 'hex');

  // timingSafeEqual throws on a length mismatch
  if (received.length !== expected.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, received);
}

// ============================================================
// REQUEST / RESPONSE SHAPES
// ============================================================

const CycleRequestSchema = z.object({
  quota: z.number().int().nonnegative().optional(),
});

const SummariesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function summarizeRun(run: CycleRun) {
  return {
    runId: run.runId,
    status: run.status,
    startedAt: run.startedAt.toISOString(),
    finishedAt: run.finishedAt.toISOString(),
    quota: run.quota,
    quotaRemaining: run.quotaRemaining,
    discovered: run.discoveredCount,
    selected: run.selectedCount,
    processed: run.processedCount,
    skipped: run.skippedCount,
    deferred: run.deferredCount,
    errors: run.errors,
    watermarks: run.watermarks.map(advance => ({
      sourceId: advance.sourceId,
      watermark: advance.watermark.toISOString(),
      moved: advance.moved,
    })),
  };
}

// ============================================================
// EXPRESS APP
// ============================================================

export interface TriggerAppDeps {
  orchestrator: FeedOrchestrator;
  ledger: DedupLedger;
  /** Required for POST /cycles; requests are refused without it */
  secret?: string;
  /** Digests are archived here after each triggered cycle when set */
  archive?: DigestArchive;
  clock?: () => Date;
}

export function createTriggerApp(deps: TriggerAppDeps): Express {
  const app = express();
  const clock = deps.clock ?? (() => new Date());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: clock().toISOString(),
      service: 'tubebrief-trigger',
      cycleRunning: deps.orchestrator.isRunning,
      state: deps.orchestrator.state,
    });
  });

  // Raw body so the signature is checked over the exact bytes sent
  app.post(
    '/cycles',
    express.raw({ type: () => true }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        if (!deps.secret) {
          log.error('TRIGGER_SECRET not configured');
          res.status(500).json({ error: 'Trigger secret not configured' });
          return;
        }

        const rawBody = Buffer.isBuffer(req.body) ? req.body.toString('utf8') : '';
        if (!verifySignature(rawBody, req.get(SIGNATURE_HEADER), deps.secret)) {
          log.warn('Invalid trigger signature');
          res.status(401).json({ error: 'Invalid signature' });
          return;
        }

        let payload: unknown = {};
        if (rawBody.trim().length > 0) {
          try {
            payload = JSON.parse(rawBody);
          } catch {
            res.status(400).json({ error: 'Body must be JSON' });
            return;
          }
        }

        const parsed = CycleRequestSchema.safeParse(payload);
        if (!parsed.success) {
          res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
          return;
        }

        const run = await deps.orchestrator.runCycle({ quota: parsed.data.quota });
        const digest = buildDigest(run.records, run.finishedAt);

        if (deps.archive) {
          await deps.archive.archive(digest, run.runId);
        }

        res.status(200).json({ run: summarizeRun(run), digest });
      } catch (error) {
        next(error);
      }
    }
  );

  app.get('/summaries', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = SummariesQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'limit must be an integer between 1 and 100' });
        return;
      }

      const records = await deps.ledger.listRecent(query.data.limit);
      res.json({
        count: records.length,
        records: records.map(record => ({
          videoId: record.videoId,
          sourceId: record.sourceId,
          title: record.title,
          link: record.link,
          outcome: record.outcome,
          publishedAt: record.publishedAt.toISOString(),
          processedAt: record.processedAt.toISOString(),
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof CycleInProgressError) {
      res.status(409).json({ error: err.message });
      return;
    }
    if (err instanceof CycleAbortedError) {
      log.error('Cycle aborted by a persistence failure', {
        runId: err.runId,
        recorded: err.records.length,
        error: err.message,
      });
      // The archive shares the failed store, so the partial digest is only returned
      res.status(503).json({
        error: 'Storage unavailable',
        runId: err.runId,
        digest: buildDigest(err.records, clock()),
      });
      return;
    }
    if (err instanceof PersistenceError) {
      log.error('Persistence failure', { error: err.message });
      res.status(503).json({ error: 'Storage unavailable' });
      return;
    }

    log.error('Unhandled error in trigger server', { error: errorMessage(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startTriggerServer(app: Express, port: number): Promise<void> {
  return new Promise(resolve => {
    app.listen(port, () => {
      log.info(`Trigger server listening on port ${port}`);
      resolve();
    });
  });
}
