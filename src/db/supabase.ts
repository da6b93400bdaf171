import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';

// Validate URL format to prevent crash
const isValidUrl = (url: string) => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

let client: SupabaseClient | null | undefined;

/**
 * Shared Supabase client, or null when the environment does not configure one.
 */
export function getSupabaseClient(): SupabaseClient | null {
    if (client !== undefined) return client;

    const { SUPABASE_URL, SUPABASE_KEY } = DEFAULT_CONFIG;
    client = SUPABASE_URL && isValidUrl(SUPABASE_URL) && SUPABASE_KEY
        ? createClient(SUPABASE_URL, SUPABASE_KEY)
        : null;
    return client;
}
