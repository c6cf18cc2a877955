/**
 * Supabase Client Configuration
 * The service-role client used by every *.db.ts adapter
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY from the persistence adapters and the auth middleware
 */
export function createSupabaseAdmin(
  config: Pick<AppConfig, 'SUPABASE_URL' | 'SUPABASE_SERVICE_KEY'>
): SupabaseClient {
  return createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}

/**
 * PostgREST code for `.single()` matching no rows
 */
export const NOT_FOUND_CODE = 'PGRST116';

/**
 * Narrow a text column to one of the allowed literals
 */
export function parseEnum<T extends string>(
  allowed: readonly T[],
  value: string,
  column: string
): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new Error(`Unexpected value for ${column}: ${value}`);
  }
  return found;
}

export function toDateOrNull(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function toIsoOrNull(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}
