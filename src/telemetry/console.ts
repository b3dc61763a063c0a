/**
 * @file Console Sink
 *
 * Renders telemetry log events to the terminal with chalk markers,
 * filtered by log level.
 *
 * @module telemetry/console
 */

import chalk from 'chalk';
import type { LogLevel } from '../config/settings.js';
import type { TelemetryBus } from './TelemetryBus.js';
import type { LogEvent, TelemetryEvent } from './types.js';

/**
 * Standard markers for log lines.
 */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
};

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export type LineWriter = (line: string, level: LogLevel) => void;

/**
 * Format one log event as a terminal line.
 */
export function logLine_format(event: LogEvent): string {
    const scope: string = chalk.dim(`[${event.scope}]`);
    const data: string = event.data && Object.keys(event.data).length > 0
        ? ' ' + chalk.gray(JSON.stringify(event.data))
        : '';
    switch (event.level) {
        case 'error':
            return `${chalk.red(MARKERS.ERROR)} ${scope} ${event.message}${data}`;
        case 'warn':
            return `${chalk.yellow(MARKERS.WARNING)} ${scope} ${event.message}${data}`;
        case 'info':
            return `${chalk.cyan(MARKERS.AFFIRMATIVE)} ${scope} ${event.message}${data}`;
        case 'debug':
            return `${chalk.gray(MARKERS.INFO)} ${scope} ${chalk.gray(event.message)}${data}`;
    }
}

/**
 * Whether a line at `level` passes a `threshold` filter.
 */
export function level_passes(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function stream_write(line: string, level: LogLevel): void {
    const stream: NodeJS.WriteStream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    stream.write(line + '\n');
}

/**
 * Attach a console sink to the bus.
 *
 * @returns Detach function.
 */
export function consoleSink_attach(bus: TelemetryBus, threshold: LogLevel, write: LineWriter = stream_write): () => void {
    return bus.subscribe((event: TelemetryEvent): void => {
        if (event.type !== 'log') return;
        if (!level_passes(event.level, threshold)) return;
        write(logLine_format(event), event.level);
    });
}
