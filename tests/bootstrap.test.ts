/**
 * Bootstrap Tests
 */

import { bootstrapVault } from '../src/bootstrap';
import { DefaultConfig } from '../src/config/default';
import { InMemoryStateRepository } from '../src/storage/stateRepository';
import { ADMIN, BOB, OPERATOR } from './fixtures';

function createTestConfig(partial: Partial<DefaultConfig> = {}): DefaultConfig {
    return {
        SUPABASE_URL: '',
        SUPABASE_KEY: '',
        VAULT_ADMIN: ADMIN,
        VAULT_OPERATOR: OPERATOR,
        VAULT_FEE_RECIPIENT: '',
        VAULT_PERFORMANCE_FEE_BPS: 2500,
        DASHBOARD_PORT: 0,
        LOG_LEVEL: 'error',
        ...partial,
    };
}

describe('bootstrapVault', () => {
    test('initializes an empty ledger from configuration', async () => {
        const repository = new InMemoryStateRepository();
        const service = await bootstrapVault(createTestConfig({ VAULT_FEE_RECIPIENT: BOB }), repository);

        expect(await service.isInitialized()).toBe(true);
        expect(repository.events.map(e => e.type)).toEqual(['ProtocolInitialized']);
        expect(repository.events[0].payload).toEqual({
            admin: ADMIN,
            operator: OPERATOR,
            feeRecipient: BOB,
            performanceFeeBps: 2500,
        });
    });

    test('does not re-initialize a stored ledger', async () => {
        const repository = new InMemoryStateRepository();
        await bootstrapVault(createTestConfig(), repository);
        await bootstrapVault(createTestConfig(), repository);
        expect(repository.saves).toBe(1);
    });

    test('leaves the ledger uninitialized without roles', async () => {
        const repository = new InMemoryStateRepository();
        const service = await bootstrapVault(createTestConfig({ VAULT_OPERATOR: '' }), repository);
        expect(await service.isInitialized()).toBe(false);
        expect(repository.saves).toBe(0);
    });
});
