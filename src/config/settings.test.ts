import { describe, it, expect } from 'vitest';
import { SettingsService } from './settings.js';

describe('SettingsService', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const service = new SettingsService({});
        expect(service.snapshot()).toEqual({
            lookup_timeout_ms: 2000,
            session_max_fragments: 1000,
            log_level: 'info',
        });
        expect(service.source_get('lookup_timeout_ms')).toBe('default');
    });

    it('reads env values and clamps them', (): void => {
        const service = new SettingsService({
            ONBOARD_DSL_LOOKUP_TIMEOUT_MS: '5',
            ONBOARD_DSL_LOG_LEVEL: 'WARN',
        });
        expect(service.lookupTimeout_resolve()).toBe(10);
        expect(service.logLevel_resolve()).toBe('warn');
        expect(service.source_get('log_level')).toBe('env');
    });

    it('ignores unparseable env values', (): void => {
        const service = new SettingsService({
            ONBOARD_DSL_SESSION_MAX_FRAGMENTS: 'lots',
            ONBOARD_DSL_LOG_LEVEL: 'verbose',
        });
        expect(service.sessionMaxFragments_resolve()).toBe(1000);
        expect(service.logLevel_resolve()).toBe('info');
        expect(service.source_get('session_max_fragments')).toBe('default');
    });

    it('applies explicit override above env with clamping', (): void => {
        const service = new SettingsService({ ONBOARD_DSL_LOOKUP_TIMEOUT_MS: '500' });
        const setResult = service.set('lookup_timeout_ms', 999999);

        expect(setResult).toEqual({ ok: true, value: 60000 });
        expect(service.lookupTimeout_resolve()).toBe(60000);
        expect(service.source_get('lookup_timeout_ms')).toBe('override');
    });

    it('supports unsetting an override', (): void => {
        const service = new SettingsService({ ONBOARD_DSL_LOOKUP_TIMEOUT_MS: '500' });
        service.set('lookup_timeout_ms', 700);
        expect(service.lookupTimeout_resolve()).toBe(700);

        service.unset('lookup_timeout_ms');
        expect(service.lookupTimeout_resolve()).toBe(500);
    });

    it('rejects invalid values', (): void => {
        const service = new SettingsService({});
        expect(service.set('session_max_fragments', 'nope').ok).toBe(false);
        expect(service.set('log_level', 'loud').ok).toBe(false);
        expect(service.set('log_level', 'Debug')).toEqual({ ok: true, value: 'debug' });
    });
});
