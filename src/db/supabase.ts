import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';
import { STATE_ROW_ID, TABLES } from '../config/constants';
import { SerializedVaultEvent, VaultSnapshot } from '../storage/snapshotCodec';
import { StateRepository } from '../storage/stateRepository';
import logger from '../utils/logger';

// Validate URL format to prevent crash
const isValidUrl = (url: string) => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

/**
 * Service-role client, or null when the environment does not configure one
 */
export function createSupabaseClient(
    url: string = DEFAULT_CONFIG.SUPABASE_URL,
    key: string = DEFAULT_CONFIG.SUPABASE_KEY
): SupabaseClient | null {
    if (!url || !key) {
        logger.warn('[DB] Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY - persistence disabled');
        return null;
    }
    if (!isValidUrl(url)) {
        logger.error(`[DB] SUPABASE_URL is not a valid URL: ${url}`);
        return null;
    }
    return createClient(url, key);
}

export class PersistenceError extends Error {
    constructor(
        message: string,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'PersistenceError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// VAULT STATE REPOSITORY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Ledger persistence on Supabase.
 *
 * SCHEMA (sql/001_vault_tables.sql):
 * - vault_state  (id = 1, payload JSONB, updated_at)
 * - vault_events (id TEXT PRIMARY KEY, type, emitted_at, payload JSONB)
 *
 * Writes go through the commit_vault_state() function so the snapshot upsert
 * and the event inserts share one database transaction.
 */
export class SupabaseStateRepository implements StateRepository {
    constructor(private readonly client: SupabaseClient) {}

    async loadState(): Promise<unknown> {
        const { data, error } = await this.client
            .from(TABLES.STATE)
            .select('payload')
            .eq('id', STATE_ROW_ID)
            .maybeSingle();

        if (error) {
            logger.error(`[DB] Failed to load vault state: ${error.message}`);
            throw new PersistenceError(`load failed: ${error.message}`, error.code);
        }

        if (!data) {
            logger.info('[DB] No stored vault state - starting empty');
            return null;
        }

        const row: { payload: unknown } = data;
        return row.payload;
    }

    async saveState(snapshot: VaultSnapshot, events: readonly SerializedVaultEvent[]): Promise<void> {
        const { error } = await this.client.rpc('commit_vault_state', {
            p_state: snapshot,
            p_events: events,
        });

        if (error) {
            // HARD FAIL: the caller rolls the in-memory ledger back
            logger.error(`[DB] commit_vault_state failed: ${error.message}`);
            logger.error(`[DB] Error code: ${error.code} | Details: ${error.details}`);
            throw new PersistenceError(`commit failed: ${error.message}`, error.code);
        }

        logger.debug(`[DB] committed vault state with ${events.length} event(s)`);
    }
}
