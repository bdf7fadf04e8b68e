/**
 * TubeBrief — Trigger Server Tests
 *
 * Tests for:
 * - Signature verification (HMAC SHA-256)
 * - POST /cycles against an in-memory pipeline
 * - GET /summaries and GET /health
 */

import { describe, it, expect, vi } from 'vitest';
import crypto from 'crypto';
import request from 'supertest';
import { SIGNATURE_HEADER, createTriggerApp, verifySignature } from '../../src/server/trigger';
import { CycleInProgressError } from '../../src/lib/errors';
import type { Digest, DigestArchive } from '../../src/digest/digest';
import { CLOCK_NOW, at, createHarness, source, video } from '../helpers/fakes';

const SECRET = 'test-secret';

const sign = (payload: string, secret = SECRET): string =>
  `sha256=${crypto.createHmac('sha256', secret).update(payload).digest('hex')}`;

function setup(options: { secret?: string } = { secret: SECRET }) {
  const harness = createHarness({ sources: [source('a', '2026-03-10T00:00:00.000Z')] });
  harness.discovery.setVideos('ref-a', [
    video('v1', '2026-03-10T01:00:00.000Z'),
    video('v2', '2026-03-10T02:00:00.000Z'),
  ]);

  const archived: Array<{ digest: Digest; runId: string }> = [];
  const archive: DigestArchive = {
    archive: async (digest, runId) => {
      archived.push({ digest, runId });
    },
  };

  const app = createTriggerApp({
    orchestrator: harness.orchestrator,
    ledger: harness.ledger,
    secret: options.secret,
    archive,
    clock: () => CLOCK_NOW,
  });

  return { app, harness, archived };
}

// ============================================================
// SIGNATURE VERIFICATION TESTS
// ============================================================

describe('verifySignature', () => {
  const payload = '{"quota": 2}';

  it('should return true for a valid signature', () => {
    expect(verifySignature(payload, sign(payload), SECRET)).toBe(true);
  });

  it('should return false for a missing or malformed signature', () => {
    expect(verifySignature(payload, undefined, SECRET)).toBe(false);
    expect(verifySignature(payload, 'sha1=abc', SECRET)).toBe(false);
    expect(verifySignature(payload, 'sha256', SECRET)).toBe(false);
    expect(verifySignature(payload, 'sha256=', SECRET)).toBe(false);
    expect(verifySignature(payload, 'sha256=abcd', SECRET)).toBe(false);
  });

  it('should return false for a tampered payload or wrong secret', () => {
    expect(verifySignature('{"quota": 9}', sign(payload), SECRET)).toBe(false);
    expect(verifySignature(payload, sign(payload, 'other-secret'), SECRET)).toBe(false);
  });
});

// ============================================================
// HTTP ENDPOINT TESTS
// ============================================================

describe('Trigger HTTP Endpoints', () => {
  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const { app } = setup();

      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({
        status: 'healthy',
        timestamp: '2026-03-10T12:00:00.000Z',
        service: 'tubebrief-trigger',
        cycleRunning: false,
        state: 'idle',
      });
    });
  });

  describe('POST /cycles', () => {
    it('should reject a request without a signature', async () => {
      const { app, harness } = setup();

      const response = await request(app).post('/cycles').send({ quota: 1 }).expect(401);

      expect(response.body.error).toBe('Invalid signature');
      expect(harness.transcriptClient.calls).toEqual([]);
    });

    it('should reject a request with an invalid signature', async () => {
      const { app } = setup();

      await request(app)
        .post('/cycles')
        .set(SIGNATURE_HEADER, 'sha256=0000')
        .set('Content-Type', 'application/json')
        .send('{"quota":1}')
        .expect(401);
    });

    it('should refuse to run when no secret is configured', async () => {
      const { app } = setup({});

      const response = await request(app).post('/cycles').expect(500);

      expect(response.body.error).toBe('Trigger secret not configured');
    });

    it('should run a cycle and return the run and digest', async () => {
      const { app, archived, harness } = setup();
      const payload = JSON.stringify({ quota: 1 });

      const response = await request(app)
        .post('/cycles')
        .set(SIGNATURE_HEADER, sign(payload))
        .set('Content-Type', 'application/json')
        .send(payload)
        .expect(200);

      expect(response.body.run).toMatchObject({
        runId: 'run-1',
        status: 'completed',
        quota: 1,
        quotaRemaining: 0,
        discovered: 2,
        selected: 1,
        processed: 1,
        watermarks: [{ sourceId: 'a', watermark: '2026-03-10T01:00:00.000Z', moved: true }],
      });
      expect(response.body.digest).toEqual({
        date: '2026-03-10',
        count: 1,
        items: [
          {
            videoId: 'v1',
            title: 'Video v1',
            summary: 'Summary of Video v1',
            link: 'https://www.youtube.com/watch?v=v1',
            publishedAt: '2026-03-10T01:00:00.000Z',
          },
        ],
      });
      expect(archived).toHaveLength(1);
      expect(archived[0].runId).toBe('run-1');
      expect(harness.sourceStore.watermarkOf('a')).toEqual(at('2026-03-10T01:00:00.000Z'));
    });

    it('should accept an empty signed body', async () => {
      const { app } = setup();

      const response = await request(app).post('/cycles').set(SIGNATURE_HEADER, sign('')).expect(200);

      expect(response.body.run.processed).toBe(2);
    });

    it('should reject an invalid quota', async () => {
      const { app } = setup();
      const payload = JSON.stringify({ quota: -1 });

      const response = await request(app)
        .post('/cycles')
        .set(SIGNATURE_HEADER, sign(payload))
        .set('Content-Type', 'application/json')
        .send(payload)
        .expect(400);

      expect(response.body.error).toBe('Invalid request');
    });

    it('should answer 409 while a cycle is running', async () => {
      const { app, harness } = setup();
      vi.spyOn(harness.orchestrator, 'runCycle').mockRejectedValueOnce(new CycleInProgressError());

      const response = await request(app).post('/cycles').set(SIGNATURE_HEADER, sign('')).expect(409);

      expect(response.body.error).toBe('A cycle is already running');
    });

    it('should answer 503 when storage fails', async () => {
      const { app, harness } = setup();
      harness.ledgerStore.failWith = new Error('connection refused');

      const response = await request(app).post('/cycles').set(SIGNATURE_HEADER, sign('')).expect(503);

      expect(response.body.error).toBe('Storage unavailable');
    });

    it('should return the partial digest when storage fails mid-cycle', async () => {
      const { app, archived, harness } = setup();
      harness.ledgerStore.insertFailures.set('v2', new Error('connection refused'));

      const response = await request(app).post('/cycles').set(SIGNATURE_HEADER, sign('')).expect(503);

      expect(response.body).toEqual({
        error: 'Storage unavailable',
        runId: 'run-1',
        digest: {
          date: '2026-03-10',
          count: 1,
          items: [
            {
              videoId: 'v1',
              title: 'Video v1',
              summary: 'Summary of Video v1',
              link: 'https://www.youtube.com/watch?v=v1',
              publishedAt: '2026-03-10T01:00:00.000Z',
            },
          ],
        },
      });
      expect(archived).toEqual([]);
    });
  });

  describe('GET /summaries', () => {
    it('should list the latest records', async () => {
      const { app, harness } = setup();
      await harness.ledger.markProcessed({
        videoId: 'old',
        sourceId: 'a',
        title: 'Old',
        link: 'https://www.youtube.com/watch?v=old',
        outcome: { kind: 'skipped', skipReason: 'no_transcript' },
        publishedAt: at('2026-03-01T00:00:00.000Z'),
        processedAt: at('2026-03-01T06:00:00.000Z'),
      });
      await harness.ledger.markProcessed({
        videoId: 'new',
        sourceId: 'a',
        title: 'New',
        link: 'https://www.youtube.com/watch?v=new',
        outcome: { kind: 'summarized', summary: 'Fresh' },
        publishedAt: at('2026-03-02T00:00:00.000Z'),
        processedAt: at('2026-03-02T06:00:00.000Z'),
      });

      const response = await request(app).get('/summaries?limit=1').expect(200);

      expect(response.body).toEqual({
        count: 1,
        records: [
          {
            videoId: 'new',
            sourceId: 'a',
            title: 'New',
            link: 'https://www.youtube.com/watch?v=new',
            outcome: { kind: 'summarized', summary: 'Fresh' },
            publishedAt: '2026-03-02T00:00:00.000Z',
            processedAt: '2026-03-02T06:00:00.000Z',
          },
        ],
      });
    });

    it('should reject an out-of-range limit', async () => {
      const { app } = setup();

      await request(app).get('/summaries?limit=0').expect(400);
    });
  });
});
