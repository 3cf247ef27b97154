/**
 * Driver settings. Defaults can be overridden from code, a YAML document or
 * environment variables.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

export interface BehaviorTreeSettings {
    /** Upper bound on tick/react calls per run. Infinity means unbounded. */
    maxTicks: number;
    /** Log every step, not only finished runs */
    verbose: boolean;
}

/** Default values for all settings */
export const DEFAULT_SETTINGS: Readonly<BehaviorTreeSettings> = {
    maxTicks: Number.POSITIVE_INFINITY,
    verbose: false,
};

const SETTING_KEYS: ReadonlyArray<keyof BehaviorTreeSettings> = ['maxTicks', 'verbose'];

function isSettingKey(key: string): key is keyof BehaviorTreeSettings {
    return SETTING_KEYS.some(k => k === key);
}

function validateMaxTicks(value: unknown): number {
    if (value === Number.POSITIVE_INFINITY) return Number.POSITIVE_INFINITY;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new Error(`Invalid setting "maxTicks": expected a positive integer or .inf, got ${String(value)}`);
    }
    return value;
}

function validateVerbose(value: unknown): boolean {
    if (typeof value !== 'boolean') {
        throw new Error(`Invalid setting "verbose": expected a boolean, got ${String(value)}`);
    }
    return value;
}

/** Merge overrides over the defaults and validate the result. Undefined overrides keep the default. */
export function resolveSettings(overrides: Partial<BehaviorTreeSettings> = {}): BehaviorTreeSettings {
    return {
        maxTicks: validateMaxTicks(overrides.maxTicks ?? DEFAULT_SETTINGS.maxTicks),
        verbose: validateVerbose(overrides.verbose ?? DEFAULT_SETTINGS.verbose),
    };
}

/**
 * Parse settings from YAML, e.g.
 *
 *     maxTicks: 500
 *     verbose: true
 *
 * An empty document yields the defaults.
 */
export function parseSettings(text: string): BehaviorTreeSettings {
    const raw: unknown = parseYaml(text);
    if (raw === null || raw === undefined) return resolveSettings();
    if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new Error('Settings YAML must be a mapping of setting names to values');
    }

    const overrides: Partial<BehaviorTreeSettings> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (!isSettingKey(key)) {
            throw new Error(`Unknown setting in YAML: "${key}". Valid settings: ${SETTING_KEYS.join(', ')}`);
        }
        if (key === 'maxTicks') overrides.maxTicks = validateMaxTicks(value);
        else overrides.verbose = validateVerbose(value);
    }
    return resolveSettings(overrides);
}

export function loadSettingsFile(path: string): BehaviorTreeSettings {
    return parseSettings(readFileSync(path, 'utf-8'));
}

/** Read `BT_MAX_TICKS` and `BT_VERBOSE` on top of the defaults. */
export function settingsFromEnv(env: Record<string, string | undefined> = process.env): BehaviorTreeSettings {
    const overrides: Partial<BehaviorTreeSettings> = {};

    const maxTicks = env.BT_MAX_TICKS;
    if (maxTicks !== undefined && maxTicks !== '') {
        overrides.maxTicks = maxTicks === 'inf' ? Number.POSITIVE_INFINITY : validateMaxTicks(Number(maxTicks));
    }

    const verbose = env.BT_VERBOSE;
    if (verbose !== undefined && verbose !== '') {
        overrides.verbose = verbose === '1' || verbose.toLowerCase() === 'true';
    }

    return resolveSettings(overrides);
}
