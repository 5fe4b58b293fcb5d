/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — REPOSITORY SELECTION + LEDGER HYDRATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * This file builds the VaultService. NO SERVER in this file.
 *
 * RULES:
 * 1. Supabase credentials present → SupabaseStateRepository
 * 2. Credentials missing → InMemoryStateRepository (state lost on exit)
 * 3. Stored ledger is decoded and restored before any request is served
 * 4. Uninitialized ledger + VAULT_ADMIN and VAULT_OPERATOR set → initialize
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DEFAULT_CONFIG, DefaultConfig } from './config/default';
import { createSupabaseClient, SupabaseStateRepository } from './db/supabase';
import { VaultService } from './services/vaultService';
import { InMemoryStateRepository, StateRepository } from './storage/stateRepository';
import logger from './utils/logger';

export function selectRepository(config: DefaultConfig = DEFAULT_CONFIG): StateRepository {
    const client = createSupabaseClient(config.SUPABASE_URL, config.SUPABASE_KEY);
    if (client) {
        logger.info('[BOOTSTRAP] Persisting ledger to Supabase');
        return new SupabaseStateRepository(client);
    }
    logger.warn('[BOOTSTRAP] Using in-memory ledger storage - state will not survive a restart');
    return new InMemoryStateRepository();
}

export async function bootstrapVault(
    config: DefaultConfig = DEFAULT_CONFIG,
    repository: StateRepository = selectRepository(config)
): Promise<VaultService> {
    const service = await VaultService.open({ repository });

    if (await service.isInitialized()) {
        logger.info('[BOOTSTRAP] Ledger already initialized');
        return service;
    }

    if (!config.VAULT_ADMIN || !config.VAULT_OPERATOR) {
        logger.warn('[BOOTSTRAP] VAULT_ADMIN / VAULT_OPERATOR not set - ledger left uninitialized');
        return service;
    }

    await service.initializeProtocol(config.VAULT_ADMIN, {
        admin: config.VAULT_ADMIN,
        operator: config.VAULT_OPERATOR,
        performanceFeeBps: config.VAULT_PERFORMANCE_FEE_BPS,
        feeRecipient: config.VAULT_FEE_RECIPIENT || undefined,
    });
    logger.info('[BOOTSTRAP] FIRST INITIALIZATION of the ledger');
    return service;
}
