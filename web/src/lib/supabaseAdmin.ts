import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getServerConfig } from "./serverConfig";

let adminClient: SupabaseClient | null = null;
let warnedMissingConfig = false;

/**
 * Service-role client for server routes. Returns null when Supabase is not
 * configured so a batch can still run without persistence.
 */
export function getSupabaseAdmin(): SupabaseClient | null {
  if (adminClient) return adminClient;

  const { supabaseUrl, supabaseServiceRoleKey } = getServerConfig();
  if (!supabaseUrl || !supabaseServiceRoleKey) {
    if (!warnedMissingConfig) {
      console.warn("Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY; classification records will not be stored");
      warnedMissingConfig = true;
    }
    return null;
  }

  // Note: This client has admin privileges. NEVER use it on the client side.
  adminClient = createClient(supabaseUrl, supabaseServiceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return adminClient;
}
