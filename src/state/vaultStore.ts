/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * VAULT STORE — CONFIG, POSITIONS AND TREASURY UNDER ONE COMMIT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Owns the three pieces of ledger state:
 *   - ProtocolConfig singleton (init-once)
 *   - UserPosition per owner
 *   - TreasuryAccount idle balance
 *
 * TRANSACTION BOUNDARY:
 *   1. transact() hands the operation a deep copy (draft) of the state
 *   2. the operation validates and mutates only the draft
 *   3. invariants are asserted on the draft
 *   4. the draft replaces the committed state in one assignment
 *
 * Any throw before step 4 leaves the committed state untouched and drops the
 * events buffered on the transaction.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { assertVaultInvariants } from '../capital/invariants';
import { VaultError } from '../core/errors';
import {
    Identity,
    ProtocolConfig,
    TreasuryAccount,
    UserPosition,
    VaultEvent,
    VaultEventPayload,
    VaultState,
} from '../types';
import { generateEventId } from '../utils/id';

export const DEFAULT_TREASURY_ID = 'treasury';

export function createEmptyVaultState(treasuryId: string = DEFAULT_TREASURY_ID): VaultState {
    return {
        config: null,
        positions: new Map(),
        treasury: { id: treasuryId, balance: 0n },
    };
}

export function cloneVaultState(state: VaultState): VaultState {
    const positions = new Map<Identity, UserPosition>();
    for (const [owner, position] of state.positions) {
        positions.set(owner, { ...position });
    }
    return {
        config: state.config ? { ...state.config } : null,
        positions,
        treasury: { ...state.treasury },
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION
// ═══════════════════════════════════════════════════════════════════════════════

export class VaultTransaction {
    private readonly buffered: VaultEventPayload[] = [];

    constructor(
        public readonly draft: VaultState,
        public readonly now: number
    ) {}

    /**
     * The initialized config, or NotInitialized
     */
    get config(): ProtocolConfig {
        if (!this.draft.config) {
            throw new VaultError('NotInitialized', 'protocol has not been initialized');
        }
        return this.draft.config;
    }

    get treasury(): TreasuryAccount {
        return this.draft.treasury;
    }

    getPosition(owner: Identity): UserPosition | undefined {
        return this.draft.positions.get(owner);
    }

    requirePosition(owner: Identity): UserPosition {
        const position = this.draft.positions.get(owner);
        if (!position) {
            throw new VaultError('PositionNotFound', `no position for ${owner}`, { owner });
        }
        return position;
    }

    emit(payload: VaultEventPayload): void {
        this.buffered.push(payload);
    }

    get events(): readonly VaultEventPayload[] {
        return this.buffered;
    }
}

export interface CommitResult<T> {
    result: T;
    events: VaultEvent[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class VaultStore {
    private state: VaultState;

    constructor(initial: VaultState = createEmptyVaultState()) {
        this.state = cloneVaultState(initial);
    }

    /**
     * Run one atomic operation against a draft copy
     */
    transact<T>(now: number, operation: (tx: VaultTransaction) => T): CommitResult<T> {
        const tx = new VaultTransaction(cloneVaultState(this.state), now);
        const result = operation(tx);

        assertVaultInvariants(tx.draft, this.state);
        this.state = tx.draft;

        const events = tx.events.map((payload): VaultEvent => ({
            ...payload,
            id: generateEventId(),
            emittedAt: now,
        }));
        return { result, events };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READ-ONLY ACCESS
    // ═══════════════════════════════════════════════════════════════════════════

    getConfig(): Readonly<ProtocolConfig> | null {
        return this.state.config;
    }

    isInitialized(): boolean {
        return this.state.config !== null;
    }

    getPosition(owner: Identity): Readonly<UserPosition> | undefined {
        return this.state.positions.get(owner);
    }

    getTreasuryBalance(): bigint {
        return this.state.treasury.balance;
    }

    /**
     * Independent copy of the committed state
     */
    snapshot(): VaultState {
        return cloneVaultState(this.state);
    }

    /**
     * Replace the committed state (hydration and rollback)
     */
    restore(state: VaultState): void {
        assertVaultInvariants(state);
        this.state = cloneVaultState(state);
    }
}
