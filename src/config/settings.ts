/**
 * @file Runtime Settings Service
 *
 * Resolves the transport options and log level for the loader with
 * deterministic precedence (explicit override > env > defaults).
 *
 * The defaults are the fixed request options the loader has always used:
 * a generic browser user agent, redirects followed, a 30 second timeout.
 *
 * @module
 */

import { logLevel_parse, type LogLevel } from '../logging/logger.js';
import type { FetchOptions } from '../netinstall/fetch/types.js';

export interface SettingsOverrides {
    timeout_ms?: number;
}

export type SettingsKey = keyof SettingsOverrides;

export type SettingSource = 'override' | 'env' | 'default';

export type SettingsEnv = Readonly<Record<string, string | undefined>>;

interface NumericBounds {
    min: number;
    max: number;
}

export const DEFAULT_USER_AGENT: string =
    'Mozilla/5.0 (X11; Linux x86_64; rv:109.0) Gecko/20100101 Firefox/115.0';

const ENV_TIMEOUT: string = 'NETINSTALL_FETCH_TIMEOUT_MS';
const ENV_LOG_LEVEL: string = 'NETINSTALL_LOG_LEVEL';

export class SettingsService {
    private overrides: SettingsOverrides = {};
    private readonly defaults: Required<SettingsOverrides> = {
        timeout_ms: 30_000,
    };
    private readonly bounds: Record<SettingsKey, NumericBounds> = {
        timeout_ms: { min: 1_000, max: 300_000 },
    };

    constructor(private readonly env: SettingsEnv = process.env) {}

    /**
     * Request options handed to the fetcher. Only the timeout is tunable.
     */
    public fetchOptions_resolve(): FetchOptions {
        return {
            userAgent: DEFAULT_USER_AGENT,
            followRedirects: true,
            timeoutMs: this.timeout_resolve(),
            headers: {},
        };
    }

    /**
     * Set one override with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: number } | { ok: false; error: string } {
        if (key !== 'timeout_ms') {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }

        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        if (!Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_clamp(key, Math.round(parsed));
        this.overrides = { ...this.overrides, [key]: clamped };
        return { ok: true, value: clamped };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        const next: SettingsOverrides = { ...this.overrides };
        delete next[key];
        this.overrides = next;
    }

    /**
     * Resolve the effective request timeout in milliseconds.
     */
    public timeout_resolve(): number {
        const override: number | undefined = this.overrides.timeout_ms;
        if (typeof override === 'number') {
            return override;
        }

        const envOverride: number | undefined = this.envNumeric_resolve(ENV_TIMEOUT);
        if (typeof envOverride === 'number') {
            return this.value_clamp('timeout_ms', envOverride);
        }

        return this.defaults.timeout_ms;
    }

    /**
     * Resolve source of the effective request timeout.
     */
    public timeout_source(): SettingSource {
        if (typeof this.overrides.timeout_ms === 'number') return 'override';
        if (typeof this.envNumeric_resolve(ENV_TIMEOUT) === 'number') return 'env';
        return 'default';
    }

    /**
     * Minimum log level; unknown values fall back to `info`.
     */
    public logLevel_resolve(): LogLevel {
        return logLevel_parse(this.env[ENV_LOG_LEVEL]) ?? 'info';
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.env[key];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(key: SettingsKey, value: number): number {
        const range: NumericBounds = this.bounds[key];
        return Math.min(range.max, Math.max(range.min, value));
    }
}
