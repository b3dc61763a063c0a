/**
 * @file Telemetry Bus
 *
 * Central event bus for log lines and domain events emitted by the DSL
 * layer. Typed facade over Node.js EventEmitter; sinks (console, tests)
 * subscribe and receive every event.
 *
 * @module telemetry/TelemetryBus
 */

import { EventEmitter } from 'events';
import type { LogLevel } from '../config/settings.js';
import type { Logger, TelemetryEvent } from './types.js';

export type TelemetryObserver = (event: TelemetryEvent) => void;

/** Internal event channel. */
const CHANNEL = 'telemetry' as const;

/**
 * Manages the emission and observation of telemetry events.
 */
export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        // Sinks are unbounded; suppress the default 10-listener warning.
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to telemetry events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: TelemetryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: TelemetryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /** Number of attached observers. */
    observers_count(): number {
        return this.emitter.listenerCount(CHANNEL);
    }

    /**
     * Create a logger whose lines are tagged with `scope`.
     */
    logger_create(scope: string): Logger {
        const line = (level: LogLevel) =>
            (message: string, data?: Record<string, unknown>): void =>
                this.emit({ type: 'log', level, scope, message, data });
        return {
            debug: line('debug'),
            info: line('info'),
            warn: line('warn'),
            error: line('error'),
        };
    }
}

/**
 * Logger that drops everything; used when a component has no bus.
 */
export const NULL_LOGGER: Logger = {
    debug: (): void => undefined,
    info: (): void => undefined,
    warn: (): void => undefined,
    error: (): void => undefined,
};
