/**
 * Snapshot Codec
 *
 * Converts ledger state and events to JSON-safe records (bigint → decimal
 * string) and back. Decoding validates every field; a malformed stored row
 * never reaches the store.
 */

import { z } from 'zod';
import { UserPosition, VaultEvent, VaultState } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const uintString = z
    .string()
    .regex(/^\d+$/, 'expected an unsigned integer string')
    .transform(value => BigInt(value));

const timestamp = z.number().int().nonnegative();

const configSchema = z.object({
    admin: z.string().min(1),
    operator: z.string().min(1),
    feeRecipient: z.string().min(1),
    treasury: z.string().min(1),
    totalShares: uintString,
    totalTradingDeployed: uintString,
    accumulatedFees: uintString,
    performanceFeeBps: z.number().int().min(0).max(10_000),
    isPaused: z.boolean(),
    lastFeeSweep: timestamp,
    deployedCurrentValue: uintString,
    lastValuationTimestamp: timestamp,
    lastDeploymentTimestamp: timestamp.default(0),
    pendingUnrealizedFees: uintString,
    initializedAt: timestamp,
});

const positionSchema = z.object({
    owner: z.string().min(1),
    shares: uintString,
    depositedAmount: uintString,
    withdrawnAmount: uintString,
    createdAt: timestamp,
    lastActivityAt: timestamp,
});

const snapshotSchema = z.object({
    version: z.literal(1),
    config: configSchema.nullable(),
    positions: z.array(positionSchema),
    treasury: z.object({
        id: z.string().min(1),
        balance: uintString,
    }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type SerializedValue = string | number | boolean | null;

export type SerializedRecord = Record<string, SerializedValue>;

export interface VaultSnapshot {
    version: 1;
    config: SerializedRecord | null;
    positions: SerializedRecord[];
    treasury: { id: string; balance: string };
}

export interface SerializedVaultEvent {
    id: string;
    type: VaultEvent['type'];
    emitted_at: number;
    payload: Record<string, SerializedValue>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODE
// ═══════════════════════════════════════════════════════════════════════════════

export function serializeValue(value: unknown): SerializedValue {
    if (typeof value === 'bigint') return value.toString();
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    throw new TypeError(`[SNAPSHOT] cannot serialize ${typeof value}`);
}

/**
 * Flat record with every bigint replaced by its decimal string
 */
export function toJsonRecord(record: object): SerializedRecord {
    const out: SerializedRecord = {};
    for (const [key, value] of Object.entries(record)) {
        out[key] = serializeValue(value);
    }
    return out;
}

export function encodeVaultState(state: VaultState): VaultSnapshot {
    return {
        version: 1,
        config: state.config ? toJsonRecord(state.config) : null,
        positions: Array.from(state.positions.values()).map(position => toJsonRecord(position)),
        treasury: { id: state.treasury.id, balance: state.treasury.balance.toString() },
    };
}

export function encodeVaultEvent(event: VaultEvent): SerializedVaultEvent {
    const { id, type, emittedAt, ...rest } = event;
    return { id, type, emitted_at: emittedAt, payload: toJsonRecord(rest) };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECODE
// ═══════════════════════════════════════════════════════════════════════════════

export class SnapshotDecodeError extends Error {
    constructor(public readonly issues: string[]) {
        super(`[SNAPSHOT] invalid stored state: ${issues.join('; ')}`);
        this.name = 'SnapshotDecodeError';
    }
}

export function decodeVaultState(raw: unknown): VaultState {
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
        throw new SnapshotDecodeError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }

    const positions = new Map<string, UserPosition>();
    for (const position of parsed.data.positions) {
        if (positions.has(position.owner)) {
            throw new SnapshotDecodeError([`positions: duplicate owner ${position.owner}`]);
        }
        positions.set(position.owner, position);
    }

    return {
        config: parsed.data.config,
        positions,
        treasury: parsed.data.treasury,
    };
}
