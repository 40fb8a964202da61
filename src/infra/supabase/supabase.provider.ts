import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { ScoutConfig } from '@/config/scout.config';

const required = (name: string, value: string | null): string => {
  if (!value) throw new Error(`Missing environment variable: ${name}`);
  return value;
};

export function createSupabaseClient(config: ScoutConfig): SupabaseClient {
  const url = required('SUPABASE_URL', config.supabaseUrl);
  const key = required('SUPABASE_SERVICE_ROLE_KEY', config.supabaseServiceRoleKey);
  return createClient(url, key, {
    auth: {
      persistSession: false, // backend only
    },
  });
}
