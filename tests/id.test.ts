/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Event ids must be unique and never reused.
 *
 * ID Format: {uuid}-{nanoseconds}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateEventId } from '../src/utils/id';

describe('generateEventId', () => {
    test('always returns unique values', () => {
        const a = generateEventId();
        const b = generateEventId();
        expect(a).not.toBe(b);
    });

    test('generates collision-resistant format with UUID and nanoseconds', () => {
        const id = generateEventId();
        const collisionResistantRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}-\d+$/i;
        expect(id).toMatch(collisionResistantRegex);
    });

    test('generates unique values across many calls', () => {
        const ids = new Set<string>();
        const count = 1000;

        for (let i = 0; i < count; i++) {
            ids.add(generateEventId());
        }

        expect(ids.size).toBe(count);
    });
});
