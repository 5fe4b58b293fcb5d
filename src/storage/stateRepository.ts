import { SerializedVaultEvent, VaultSnapshot } from './snapshotCodec';

/**
 * Durable home of the committed ledger state and its event log.
 * saveState must write the snapshot and the events together or not at all.
 */
export interface StateRepository {
    /** Raw stored snapshot, null when nothing has been saved yet. Callers decode it. */
    loadState(): Promise<unknown>;
    saveState(snapshot: VaultSnapshot, events: readonly SerializedVaultEvent[]): Promise<void>;
}

/**
 * Process-local repository for tests and runs without a database
 */
export class InMemoryStateRepository implements StateRepository {
    private stored: string | null = null;
    private readonly log: SerializedVaultEvent[] = [];
    private saveCount = 0;

    constructor(initial?: VaultSnapshot) {
        if (initial) this.stored = JSON.stringify(initial);
    }

    async loadState(): Promise<unknown> {
        if (this.stored === null) return null;
        const parsed: unknown = JSON.parse(this.stored);
        return parsed;
    }

    async saveState(snapshot: VaultSnapshot, events: readonly SerializedVaultEvent[]): Promise<void> {
        this.stored = JSON.stringify(snapshot);
        this.log.push(...events.map(event => ({ ...event, payload: { ...event.payload } })));
        this.saveCount++;
    }

    get events(): readonly SerializedVaultEvent[] {
        return this.log;
    }

    get saves(): number {
        return this.saveCount;
    }
}
