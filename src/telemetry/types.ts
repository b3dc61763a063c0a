/**
 * @file Telemetry Types
 *
 * Event shapes carried on the telemetry bus.
 *
 * @module telemetry/types
 */

import type { LogLevel } from '../config/settings.js';

export interface LogEvent {
    type: 'log';
    level: LogLevel;
    scope: string;
    message: string;
    data?: Record<string, unknown>;
}

export type TelemetryEvent =
    | LogEvent
    | { type: 'domain_registered'; domain: string; version: string }
    | { type: 'validation_failed'; domain: string; code: string; message: string }
    | { type: 'attribute_fallback'; attributeId: string; reason: string }
    | { type: 'dsl_accumulated'; sessionId: string; domain: string; fragments: number }
    | { type: 'dsl_generated'; domain: string; verb: string; intent: string };

/**
 * Scoped logger handed to components.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}
