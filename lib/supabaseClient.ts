import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { MissingConfigError } from "./config.js";

let client: SupabaseClient | null = null;

/**
 * Lazily created service client. Throws only when first needed, so the
 * local-disk backend runs without Supabase env vars.
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const supabaseUrl = process.env.SUPABASE_URL;
  const key =
    process.env.SUPABASE_SERVICE_ROLE_KEY ??
    process.env.SUPABASE_ANON_KEY ??
    process.env.SUPABASE_KEY;

  if (!supabaseUrl) throw new MissingConfigError("SUPABASE_URL");
  if (!key) throw new MissingConfigError("SUPABASE_SERVICE_ROLE_KEY");

  client = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
