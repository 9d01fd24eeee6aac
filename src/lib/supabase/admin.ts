import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Supabase Admin Client
 * Uses Service Role to bypass RLS.
 * MUST be used only on server (never browser).
 */
export function createAdminClient(supabaseUrl: string, serviceRoleKey: string): SupabaseClient {
  return createClient(supabaseUrl, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
  });
}
