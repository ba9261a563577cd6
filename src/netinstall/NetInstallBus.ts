/**
 * @file NetInstall Bus
 *
 * Typed facade over Node.js EventEmitter carrying the loader's
 * notifications to the host UI: status changes, readiness, label changes.
 *
 * @module netinstall/NetInstallBus
 */

import { EventEmitter } from 'events';
import type { NetInstallEvent, NetInstallObserver } from './types.js';

/** Internal event channel. Single constant avoids string literals at call sites. */
const CHANNEL = 'netinstall' as const;

export class NetInstallBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to loader events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: NetInstallObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: NetInstallEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /** Drop every subscriber (module teardown). */
    clear(): void {
        this.emitter.removeAllListeners(CHANNEL);
    }
}
