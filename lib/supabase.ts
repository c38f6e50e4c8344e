import { createClient } from '@supabase/supabase-js';

export const createSupabaseAdmin = (url: string, serviceKey: string, fetchImpl?: typeof fetch) =>
  createClient(url, serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
    global: fetchImpl ? { fetch: fetchImpl } : undefined
  });
