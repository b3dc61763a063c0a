/**
 * @file Layer Factory
 *
 * Wiring for the standard setup: both bundled domains sharing one
 * attribute resolver, the registry, a router and a session accumulator.
 *
 * @module registry/factory
 */

import { SettingsService } from '../config/settings.js';
import { AttributeResolver } from '../dictionary/AttributeResolver.js';
import type { DictionaryRepository } from '../dictionary/types.js';
import { OnboardingDomain } from '../domains/onboarding/OnboardingDomain.js';
import { UboDomain } from '../domains/ubo/UboDomain.js';
import { SessionAccumulator } from '../session/SessionAccumulator.js';
import { consoleSink_attach, type LineWriter } from '../telemetry/console.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import { DomainRegistry } from './DomainRegistry.js';
import { DomainRouter } from './DomainRouter.js';

export interface DslLayerConfig {
    repository?: DictionaryRepository | null;
    settings?: SettingsService;
    bus?: TelemetryBus;
    defaultDomain?: string;
    now?: () => Date;
    /**
     * Attach a console sink filtered at the `log_level` setting; a
     * function receives the formatted lines instead of stdout/stderr.
     */
    consoleSink?: boolean | LineWriter;
}

/**
 * Container for the pre-wired services.
 */
export interface DslLayer {
    bus: TelemetryBus;
    settings: SettingsService;
    resolver: AttributeResolver;
    registry: DomainRegistry;
    router: DomainRouter;
    sessions: SessionAccumulator;
    /** Detach the console sink; a no-op when none was attached. */
    sink_detach: () => void;
}

function consoleSink_wire(bus: TelemetryBus, settings: SettingsService, sink: boolean | LineWriter): () => void {
    if (sink === false) return (): void => undefined;
    const write: LineWriter | undefined = sink === true ? undefined : sink;
    return consoleSink_attach(bus, settings.logLevel_resolve(), write);
}

export function dslLayer_assemble(config: DslLayerConfig = {}): DslLayer {
    const bus: TelemetryBus = config.bus ?? new TelemetryBus();
    const settings: SettingsService = config.settings ?? SettingsService.instance_get();
    const sink_detach: () => void = consoleSink_wire(bus, settings, config.consoleSink ?? false);
    const resolver: AttributeResolver = new AttributeResolver({ repository: config.repository ?? null, settings, bus });

    const registry: DomainRegistry = new DomainRegistry({ bus, now: config.now });
    registry.domain_register(new OnboardingDomain({ resolver, settings, bus, now: config.now }));
    registry.domain_register(new UboDomain({ resolver, settings, bus, now: config.now }));

    return {
        bus,
        settings,
        resolver,
        registry,
        router: new DomainRouter(registry, { defaultDomain: config.defaultDomain ?? 'onboarding', bus }),
        sessions: new SessionAccumulator({ registry, settings, bus, now: config.now }),
        sink_detach,
    };
}
