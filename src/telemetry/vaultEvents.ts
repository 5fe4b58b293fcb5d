/**
 * Vault Event Bus
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Publishes committed event records to in-process subscribers (monitoring,
 * persistence, dashboards). Only committed transactions ever reach the bus.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { EventEmitter } from 'events';
import { VaultEvent, VaultEventType } from '../types';
import logger from '../utils/logger';

export interface EventSink {
    publish(events: readonly VaultEvent[]): void;
}

export type VaultEventListener = (event: VaultEvent) => void;

const EVENT_CHANNEL = 'vault-event';

export class VaultEventBus implements EventSink {
    private readonly emitter = new EventEmitter();

    publish(events: readonly VaultEvent[]): void {
        for (const event of events) {
            logger.debug(`[EVENTS] ${event.type} id=${event.id.slice(0, 8)}...`);
            this.emitter.emit(EVENT_CHANNEL, event);
        }
    }

    /**
     * Subscribe to every event, or only to the given types.
     * Returns an unsubscribe function.
     */
    subscribe(listener: VaultEventListener, types?: readonly VaultEventType[]): () => void {
        const handler = (event: VaultEvent) => {
            if (!types || types.includes(event.type)) {
                listener(event);
            }
        };
        this.emitter.on(EVENT_CHANNEL, handler);
        return () => {
            this.emitter.off(EVENT_CHANNEL, handler);
        };
    }
}
