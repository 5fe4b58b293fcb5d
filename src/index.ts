/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * NO runtime logic at import time. The process entry point is start.ts.
 */

export * from './types';
export * from './core/errors';
export { AccountingEngine, AccountingEngineOptions } from './core/accountingEngine';
export * from './capital';
export { VaultStore, VaultTransaction, CommitResult, createEmptyVaultState, cloneVaultState } from './state/vaultStore';
export { VaultEventBus, EventSink, VaultEventListener } from './telemetry/vaultEvents';
export { VaultService, VaultServiceOptions } from './services/vaultService';
export { parseValuationReport } from './services/valuationIntake';
export { StateRepository, InMemoryStateRepository } from './storage/stateRepository';
export {
    SnapshotDecodeError,
    VaultSnapshot,
    SerializedVaultEvent,
    decodeVaultState,
    encodeVaultEvent,
    encodeVaultState,
} from './storage/snapshotCodec';
export { SupabaseStateRepository, PersistenceError, createSupabaseClient } from './db/supabase';
export { createDashboardApp, startDashboard } from './dashboard/server';
export { bootstrapVault } from './bootstrap';
export { parseAmount, parseSignedAmount, formatAmount } from './utils/math';
export { VAULT_CONFIG } from './config/constants';
