/**
 * TubeBrief — Seed Channels Script
 *
 * Registers the channels listed in a JSON file (default:
 * supabase/seed-channels.json). Channels already present keep their
 * watermark.
 *
 * Usage:
 *   npm run seed
 *   npm run seed -- --file my-channels.json
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/lib/config';
import { createSupabaseClient } from '../src/db/client';
import { SupabaseSourceStore } from '../src/db/queries';

const DEFAULT_FILE = fileURLToPath(new URL('../supabase/seed-channels.json', import.meta.url));

const SeedFileSchema = z.array(
  z.object({
    name: z.string().min(1),
    channelId: z.string().regex(/^UC[\w-]{22}$/, 'expected a UC... channel id'),
  })
);

async function seed(): Promise<void> {
  const args = process.argv.slice(2);
  const fileIndex = args.indexOf('--file');
  const file = fileIndex >= 0 && args[fileIndex + 1] ? args[fileIndex + 1] : DEFAULT_FILE;

  const channels = SeedFileSchema.parse(JSON.parse(await readFile(file, 'utf8')));
  const config = loadConfig();
  const store = new SupabaseSourceStore(createSupabaseClient(config.supabase));

  for (const channel of channels) {
    const id = await store.register({ name: channel.name, channelRef: channel.channelId });
    logger.info('Channel registered', { id, name: channel.name, channelId: channel.channelId });
  }

  console.log('\n===========================================');
  console.log('SEED COMPLETED SUCCESSFULLY');
  console.log('===========================================');
  console.log(`Channels: ${channels.length}`);
  console.log('===========================================\n');
}

seed().catch(error => {
  logger.error('Seed failed', { error: errorMessage(error) });
  process.exit(1);
});
