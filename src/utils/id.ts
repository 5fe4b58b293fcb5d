/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every emitted vault event gets a fresh, never-reused id.
 *
 * FORMAT: {uuid-v4}-{nanoseconds}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a collision-resistant id for a vault event.
 *
 * @example
 * ```typescript
 * const id = generateEventId();
 * // Returns: "550e8400-e29b-41d4-a716-446655440000-1234567890123456789"
 * ```
 */
export function generateEventId(): string {
    return `${uuidv4()}-${process.hrtime.bigint().toString()}`;
}
