/**
 * Supabase Client Configuration
 * One service-role client backs the metadata store; bearer tokens are
 * verified through the same client's auth API.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY on the server; never expose the service key
 */
export function createSupabaseAdmin(config: {
  url: string;
  serviceKey: string;
}): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
