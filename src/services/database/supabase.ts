import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';

export interface SupabaseClientOptions {
  fetch?: typeof fetch;
}

// Service role key so the API can write regardless of row level security
export function createSupabaseClient(
  url: string,
  serviceRoleKey: string,
  options: SupabaseClientOptions = {}
): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    // Node 20 has no global WebSocket for the realtime client
    realtime: { transport: WebSocket },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}
