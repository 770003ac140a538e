import { createClient, type SupabaseClient } from '@supabase/supabase-js'

let cachedClient: SupabaseClient | null = null;

/**
 * Supabase client for saving reports. Created on first use so that runs which never persist
 * anything do not need the credentials.
 */
export function getSupabase(): SupabaseClient {
    if (cachedClient) {
        return cachedClient;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseAnonKey = process.env.SUPABASE_ANON_KEY;

    if (!supabaseUrl || !supabaseAnonKey) {
        throw new Error('SUPABASE_URL and SUPABASE_ANON_KEY must be set in the environment to save results.');
    }

    // Add global headers to ensure all requests accept JSON, fixing 406 errors.
    cachedClient = createClient(supabaseUrl, supabaseAnonKey, {
        auth: { persistSession: false },
        global: {
            headers: {
                'Accept': 'application/json'
            }
        }
    });
    return cachedClient;
}
