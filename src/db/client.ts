/**
 * TubeBrief — Supabase Client
 *
 * Service-role client for the cycle runner and the trigger server. Both are
 * background processes, so sessions are never persisted or refreshed.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { PersistenceError } from '../lib/errors';
import type { AppConfig } from '../lib/config';

// ============================================================
// CLIENT
// ============================================================

export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

export interface DatabaseHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Check that the channels table is reachable.
 */
export async function checkDatabaseHealth(client: SupabaseClient): Promise<DatabaseHealth> {
  const start = Date.now();
  try {
    const { error } = await client.from('channels').select('id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

/**
 * Shape of a PostgREST error as returned by supabase-js.
 */
export interface SupabaseErrorLike {
  message: string;
  code?: string;
}

/**
 * Handle Supabase errors consistently.
 */
export function handleSupabaseError(operation: string, error: SupabaseErrorLike): PersistenceError {
  return new PersistenceError(
    `${operation}: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`,
    { cause: error }
  );
}
