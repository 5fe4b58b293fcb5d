/**
 * Vault Service - Serialized, Persistent Ledger Access
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * CRITICAL: EXTERNAL CALLERS (DASHBOARD, REPORTERS, SCRIPTS) USE THIS MODULE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * This module handles:
 * - One single-lane queue for every request, so operations never interleave
 * - Persisting the committed snapshot and its events after each write
 * - Rolling the in-memory ledger back when persistence fails
 * - Publishing events to the bus only once they are durable
 *
 * RULES:
 * 1. A write is acknowledged only after saveState() resolves
 * 2. A failed save restores the pre-operation snapshot, then rethrows
 * 3. Reads queue behind pending writes
 */

import PQueue from 'p-queue';
import { AccountingEngine } from '../core/accountingEngine';
import { isVaultError } from '../core/errors';
import { decodeVaultState, encodeVaultEvent, encodeVaultState } from '../storage/snapshotCodec';
import { StateRepository } from '../storage/stateRepository';
import { EventSink, VaultEventBus } from '../telemetry/vaultEvents';
import {
    Clock,
    DepositResult,
    Identity,
    InitializeProtocolParams,
    ProtocolConfig,
    ProtocolStats,
    ReturnCapitalResult,
    UserBalance,
    UserPosition,
    UserStats,
    ValuationReport,
    VaultEvent,
    WithdrawResult,
} from '../types';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface VaultServiceOptions {
    repository: StateRepository;
    bus?: VaultEventBus;
    clock?: Clock;
}

/**
 * Holds engine events until the owning write has been persisted
 */
class PendingEventSink implements EventSink {
    private pending: VaultEvent[] = [];

    publish(events: readonly VaultEvent[]): void {
        this.pending.push(...events);
    }

    drain(): VaultEvent[] {
        const drained = this.pending;
        this.pending = [];
        return drained;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// VAULT SERVICE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class VaultService {
    readonly bus: VaultEventBus;
    private readonly engine: AccountingEngine;
    private readonly repository: StateRepository;
    private readonly sink = new PendingEventSink();
    private readonly queue = new PQueue({ concurrency: 1 });

    constructor(options: VaultServiceOptions) {
        this.repository = options.repository;
        this.bus = options.bus ?? new VaultEventBus();
        this.engine = new AccountingEngine({ clock: options.clock, sink: this.sink });
    }

    /**
     * Create a service and load the stored ledger into it
     */
    static async open(options: VaultServiceOptions): Promise<VaultService> {
        const service = new VaultService(options);
        await service.hydrate();
        return service;
    }

    /**
     * Replace the in-memory ledger with the repository's stored snapshot
     */
    hydrate(): Promise<void> {
        return this.enqueue(async () => {
            const raw = await this.repository.loadState();
            if (raw === null) {
                logger.info('[SERVICE] No stored ledger - starting uninitialized');
                return;
            }
            const state = decodeVaultState(raw);
            this.engine.store.restore(state);
            logger.info(
                `[SERVICE] Hydrated ledger: ${state.positions.size} position(s), ` +
                `initialized=${state.config !== null}`
            );
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUEUE
    // ═══════════════════════════════════════════════════════════════════════════

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        return this.queue.add(task);
    }

    private write<T>(label: string, operation: (engine: AccountingEngine) => T): Promise<T> {
        return this.enqueue(async () => {
            const before = this.engine.store.snapshot();

            let result: T;
            try {
                result = operation(this.engine);
            } catch (err: unknown) {
                if (isVaultError(err)) {
                    logger.warn(`[SERVICE] ${label} rejected: ${err.message}`);
                } else {
                    logger.error(`[SERVICE] ${label} failed: ${err instanceof Error ? err.message : String(err)}`);
                }
                throw err;
            }

            const events = this.sink.drain();
            try {
                await this.repository.saveState(
                    encodeVaultState(this.engine.store.snapshot()),
                    events.map(encodeVaultEvent)
                );
            } catch (err: unknown) {
                this.engine.store.restore(before);
                logger.error(
                    `[SERVICE] ${label} rolled back - persistence failed: ` +
                    `${err instanceof Error ? err.message : String(err)}`
                );
                throw err;
            }

            this.bus.publish(events);
            return result;
        });
    }

    private read<T>(view: (engine: AccountingEngine) => T): Promise<T> {
        return this.enqueue(async () => view(this.engine));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // WRITES
    // ═══════════════════════════════════════════════════════════════════════════

    initializeProtocol(caller: Identity, params: InitializeProtocolParams): Promise<ProtocolConfig> {
        return this.write('initializeProtocol', engine => engine.initializeProtocol(caller, params));
    }

    pauseProtocol(caller: Identity): Promise<void> {
        return this.write('pauseProtocol', engine => engine.pauseProtocol(caller));
    }

    unpauseProtocol(caller: Identity): Promise<void> {
        return this.write('unpauseProtocol', engine => engine.unpauseProtocol(caller));
    }

    setFeeRecipient(caller: Identity, feeRecipient: Identity): Promise<void> {
        return this.write('setFeeRecipient', engine => engine.setFeeRecipient(caller, feeRecipient));
    }

    createUserPosition(owner: Identity): Promise<UserPosition> {
        return this.write('createUserPosition', engine => engine.createUserPosition(owner));
    }

    deposit(owner: Identity, amount: bigint, minShares?: bigint): Promise<DepositResult> {
        return this.write('deposit', engine => engine.deposit(owner, amount, minShares));
    }

    withdraw(owner: Identity, sharesToRedeem: bigint, minPayout?: bigint): Promise<WithdrawResult> {
        return this.write('withdraw', engine => engine.withdraw(owner, sharesToRedeem, minPayout));
    }

    withdrawAmount(owner: Identity, amount: bigint, maxShares?: bigint): Promise<WithdrawResult> {
        return this.write('withdrawAmount', engine => engine.withdrawAmount(owner, amount, maxShares));
    }

    deployCapitalForTrading(caller: Identity, amount: bigint): Promise<void> {
        return this.write('deployCapitalForTrading', engine => engine.deployCapitalForTrading(caller, amount));
    }

    returnCapitalFromTrading(
        caller: Identity,
        amountReturned: bigint,
        realizedPnl: bigint
    ): Promise<ReturnCapitalResult> {
        return this.write('returnCapitalFromTrading', engine =>
            engine.returnCapitalFromTrading(caller, amountReturned, realizedPnl)
        );
    }

    updateDeploymentValuation(caller: Identity, report: ValuationReport): Promise<void> {
        return this.write('updateDeploymentValuation', engine => engine.updateDeploymentValuation(caller, report));
    }

    sweepFees(caller: Identity): Promise<bigint> {
        return this.write('sweepFees', engine => engine.sweepFees(caller));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    isInitialized(): Promise<boolean> {
        return this.read(engine => engine.store.isInitialized());
    }

    calculateUserBalance(owner: Identity): Promise<UserBalance> {
        return this.read(engine => engine.calculateUserBalance(owner));
    }

    getProtocolStats(): Promise<ProtocolStats> {
        return this.read(engine => engine.getProtocolStats());
    }

    getUserStats(owner: Identity): Promise<UserStats> {
        return this.read(engine => engine.getUserStats(owner));
    }
}
