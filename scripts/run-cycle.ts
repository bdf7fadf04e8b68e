/**
 * TubeBrief — Run Cycle Script
 *
 * Runs one polling cycle over every active channel and writes the day's
 * digest.
 *
 * Usage:
 *   npm run cycle                          # Default quota, digest to DIGEST_OUTPUT_PATH
 *   npm run cycle -- --quota 3             # Admit at most 3 videos
 *   npm run cycle -- --output digest.json  # Write the digest elsewhere
 *   npm run cycle -- --dry-run             # Don't archive the digest
 */

import { writeFile } from 'fs/promises';
import { logger } from '../src/lib/logger';
import { CycleAbortedError, errorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/lib/config';
import { createPipeline } from '../src/app';
import { buildDigest, exportDigestAsJson, renderDigestMarkdown } from '../src/digest/digest';

// ============================================================
// CONFIGURATION
// ============================================================

interface CycleScriptOptions {
  quota?: number;
  output?: string;
  dryRun: boolean;
}

function parseArgs(): CycleScriptOptions {
  const args = process.argv.slice(2);
  const options: CycleScriptOptions = { dryRun: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--quota' && args[i + 1]) {
      options.quota = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--output' && args[i + 1]) {
      options.output = args[i + 1];
      i++;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function runCycle(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();
  const outputPath = options.output ?? config.digest.outputPath;

  console.log('\n' + '='.repeat(60));
  console.log('TUBEBRIEF CYCLE');
  console.log('='.repeat(60));
  console.log(`Provider: ${config.llm.provider} (${config.llm.model})`);
  console.log(`Quota: ${options.quota ?? config.cycle.quota}`);
  console.log(`Dry Run: ${options.dryRun}`);
  console.log('='.repeat(60) + '\n');

  const { orchestrator, archive } = createPipeline(config);

  process.once('SIGINT', () => {
    console.log('\nCancelling after the current video...');
    orchestrator.cancel();
  });

  const run = await orchestrator.runCycle({ quota: options.quota }).catch(async (error: unknown) => {
    if (error instanceof CycleAbortedError) {
      const partial = buildDigest(error.records);
      await writeFile(outputPath, exportDigestAsJson(partial) + '\n', 'utf8');
      logger.warn('Partial digest written before abort', { path: outputPath, items: partial.count });
    }
    throw error;
  });
  const digest = buildDigest(run.records, run.finishedAt);

  await writeFile(outputPath, exportDigestAsJson(digest) + '\n', 'utf8');
  logger.info('Digest written', { path: outputPath, items: digest.count });

  if (!options.dryRun) {
    await archive.archive(digest, run.runId);
  }

  console.log('\n' + renderDigestMarkdown(digest) + '\n');

  const duration = ((run.finishedAt.getTime() - run.startedAt.getTime()) / 1000).toFixed(2);
  console.log('='.repeat(60));
  console.log(run.status === 'cancelled' ? 'CYCLE CANCELLED' : 'CYCLE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Run ID: ${run.runId}`);
  console.log(`Duration: ${duration}s`);
  console.log(`Discovered: ${run.discoveredCount}`);
  console.log(`Processed: ${run.processedCount}`);
  console.log(`Skipped: ${run.skippedCount}`);
  console.log(`Deferred: ${run.deferredCount}`);
  console.log(`Quota remaining: ${run.quotaRemaining}`);
  for (const issue of run.errors) {
    const subject = issue.disposition === 'source_failed' ? issue.sourceId : issue.videoId;
    console.log(`  ${issue.disposition.padEnd(13)} ${issue.reason.padEnd(22)} ${subject}`);
  }
  console.log('='.repeat(60) + '\n');
}

runCycle().catch(error => {
  logger.error('Cycle failed', { error: errorMessage(error) });
  process.exit(1);
});
