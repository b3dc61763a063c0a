/**
 * @file TelemetryBus and console sink tests.
 */

import { describe, it, expect, vi } from 'vitest';
import chalk from 'chalk';
import { TelemetryBus } from './TelemetryBus.js';
import { consoleSink_attach, level_passes, logLine_format } from './console.js';
import type { TelemetryEvent } from './types.js';

describe('TelemetryBus', (): void => {
    it('delivers events to subscribers until they unsubscribe', (): void => {
        const bus = new TelemetryBus();
        const seen: TelemetryEvent[] = [];
        const unsubscribe = bus.subscribe((e: TelemetryEvent): void => { seen.push(e); });

        bus.emit({ type: 'domain_registered', domain: 'onboarding', version: '1.0.0' });
        unsubscribe();
        bus.emit({ type: 'domain_registered', domain: 'ubo', version: '1.0.0' });

        expect(seen).toEqual([{ type: 'domain_registered', domain: 'onboarding', version: '1.0.0' }]);
        expect(bus.observers_count()).toBe(0);
    });

    it('tags logger lines with scope and level', (): void => {
        const bus = new TelemetryBus();
        const observer = vi.fn();
        bus.subscribe(observer);

        bus.logger_create('registry').warn('slow lookup', { ms: 40 });

        expect(observer).toHaveBeenCalledWith({
            type: 'log', level: 'warn', scope: 'registry', message: 'slow lookup', data: { ms: 40 },
        });
    });
});

describe('console sink', (): void => {
    it('filters below the threshold', (): void => {
        expect(level_passes('debug', 'info')).toBe(false);
        expect(level_passes('error', 'info')).toBe(true);
        expect(level_passes('info', 'info')).toBe(true);
    });

    it('writes formatted lines for passing events only', (): void => {
        const bus = new TelemetryBus();
        const lines: string[] = [];
        const detach = consoleSink_attach(bus, 'warn', (line: string): void => { lines.push(line); });
        const log = bus.logger_create('resolver');

        log.info('ignored');
        log.error('lookup failed');
        bus.emit({ type: 'attribute_fallback', attributeId: 'abc12345', reason: 'missing' });
        detach();
        log.error('after detach');

        expect(lines).toEqual([
            logLine_format({ type: 'log', level: 'error', scope: 'resolver', message: 'lookup failed' }),
        ]);
    });

    it('uses the error marker for error lines', (): void => {
        const line = logLine_format({ type: 'log', level: 'error', scope: 's', message: 'boom' });
        expect(line).toBe(`${chalk.red('>> ERROR:')} ${chalk.dim('[s]')} boom`);
    });
});
