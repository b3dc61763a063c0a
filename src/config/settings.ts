/**
 * @file Runtime Settings Service
 *
 * Process-scoped settings for the DSL layer with central validation and
 * deterministic precedence (explicit override > env > defaults).
 *
 * @module config/settings
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface DslSettings {
    lookup_timeout_ms?: number;
    session_max_fragments?: number;
    log_level?: LogLevel;
}

export type SettingsKey = keyof DslSettings;

export interface ResolvedDslSettings {
    lookup_timeout_ms: number;
    session_max_fragments: number;
    log_level: LogLevel;
}

export type SettingSource = 'override' | 'env' | 'default';

type NumericKey = 'lookup_timeout_ms' | 'session_max_fragments';

interface NumericBounds {
    min: number;
    max: number;
}

const ENV_KEYS: Record<SettingsKey, string> = {
    lookup_timeout_ms: 'ONBOARD_DSL_LOOKUP_TIMEOUT_MS',
    session_max_fragments: 'ONBOARD_DSL_SESSION_MAX_FRAGMENTS',
    log_level: 'ONBOARD_DSL_LOG_LEVEL',
};

/**
 * Type guard for accepted log levels.
 */
export function logLevel_isValid(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private overrides: DslSettings = {};
    private readonly env: Record<string, string | undefined>;
    private readonly defaults: ResolvedDslSettings = {
        lookup_timeout_ms: 2000,
        session_max_fragments: 1000,
        log_level: 'info',
    };
    private readonly bounds: Record<NumericKey, NumericBounds> = {
        lookup_timeout_ms: { min: 10, max: 60000 },
        session_max_fragments: { min: 1, max: 100000 },
    };

    /**
     * @param env - Environment source; defaults to `process.env`.
     */
    constructor(env?: Record<string, string | undefined>) {
        this.env = env ?? process.env;
    }

    /**
     * Resolve process-global singleton.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedDslSettings {
        return {
            lookup_timeout_ms: this.numeric_resolve('lookup_timeout_ms'),
            session_max_fragments: this.numeric_resolve('session_max_fragments'),
            log_level: this.logLevel_resolve(),
        };
    }

    /**
     * Set one override with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: number | LogLevel } | { ok: false; error: string } {
        if (key === 'log_level') {
            const level: string = String(value).trim().toLowerCase();
            if (!logLevel_isValid(level)) {
                return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
            }
            this.overrides = { ...this.overrides, log_level: level };
            return { ok: true, value: level };
        }

        if (key !== 'lookup_timeout_ms' && key !== 'session_max_fragments') {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }

        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        if (!Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_clamp(key, Math.round(parsed));
        const next: DslSettings = { ...this.overrides };
        next[key] = clamped;
        this.overrides = next;
        return { ok: true, value: clamped };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        const next: DslSettings = { ...this.overrides };
        delete next[key];
        this.overrides = next;
    }

    /**
     * Resolve where the effective value of a key comes from.
     */
    public source_get(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (key === 'log_level') {
            return this.envLogLevel_resolve() !== undefined ? 'env' : 'default';
        }
        return this.envNumeric_resolve(ENV_KEYS[key]) !== undefined ? 'env' : 'default';
    }

    public lookupTimeout_resolve(): number {
        return this.numeric_resolve('lookup_timeout_ms');
    }

    public sessionMaxFragments_resolve(): number {
        return this.numeric_resolve('session_max_fragments');
    }

    public logLevel_resolve(): LogLevel {
        return this.overrides.log_level ?? this.envLogLevel_resolve() ?? this.defaults.log_level;
    }

    private numeric_resolve(key: NumericKey): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number') {
            return this.value_clamp(key, override);
        }

        const envOverride: number | undefined = this.envNumeric_resolve(ENV_KEYS[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }

        return this.defaults[key];
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.env[key];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private envLogLevel_resolve(): LogLevel | undefined {
        const envRaw: string | undefined = this.env[ENV_KEYS.log_level];
        if (!envRaw) return undefined;
        const level: string = envRaw.trim().toLowerCase();
        return logLevel_isValid(level) ? level : undefined;
    }

    private value_clamp(key: NumericKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}
