import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Service-role client for the controller. Sessions are never persisted: the controller
 * acts on its own authority, not on behalf of a browser user.
 */
export function createServiceClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export type { SupabaseClient };
