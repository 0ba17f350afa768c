import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

// Singleton Supabase client instance
let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create the Supabase client (singleton).
 *
 * The service role key bypasses RLS: authorization is enforced by the
 * API itself, and the ledger functions must be able to lock product rows.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

const REQUIRED_TABLES = ['invoices', 'products', 'inventory_transactions'] as const;

/**
 * Probe the tables the ledger functions write to. Fails when any of them is
 * unreachable, which usually means the migrations have not been applied.
 */
export const testConnection = async (): Promise<boolean> => {
  const client = getSupabaseClient();

  try {
    const results = await Promise.all(
      REQUIRED_TABLES.map(async (table) => {
        const { error } = await client.from(table).select('id', { head: true, count: 'exact' });
        return { table, error };
      })
    );
    const failed = results.filter((result) => result.error !== null);

    if (failed.length > 0) {
      logger.error('Database connection test failed', {
        tables: failed.map((result) => ({ table: result.table, error: result.error?.message })),
      });
      return false;
    }

    logger.info('Database connection test successful', { tables: REQUIRED_TABLES });
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};

/**
 * Drop the client reference on shutdown (pooling is managed by Supabase)
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    supabaseClient = null;
    logger.info('Supabase client connection closed');
  }
};
