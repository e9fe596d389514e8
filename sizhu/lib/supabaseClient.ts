import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | null = null;

function missingEnvError() {
  return new Error("Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)");
}

/**
 * Shared service-role client. Created on first use so runs that only write
 * locally never need Supabase credentials.
 */
export function getSupabaseClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  if (client) return client;

  const supabaseUrl = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_ANON_KEY ?? env.SUPABASE_KEY;
  if (!supabaseUrl || !key) throw missingEnvError();

  client = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
