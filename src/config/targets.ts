import type { Env } from './env.js';
import { getSearchDefaults } from './defaults.js';

export interface Targets {
    roles: string[];
    locations: string[];
    patterns: string[];
}

export interface TargetOverrides {
    roles?: string[];
    locations?: string[];
}

/** Command-line overrides win over the environment, which wins over the defaults file. */
export function resolveTargets(
    env: Pick<Env, 'TARGET_ROLES' | 'TARGET_LOCATIONS' | 'SEARCH_PATTERNS'>,
    overrides: TargetOverrides = {},
): Targets {
    const defaults = getSearchDefaults();
    return {
        roles: overrides.roles ?? env.TARGET_ROLES ?? defaults.roles,
        locations: overrides.locations ?? env.TARGET_LOCATIONS ?? defaults.locations,
        patterns: env.SEARCH_PATTERNS ?? defaults.patterns,
    };
}

export function parseList(value: string): string[] {
    return value.split(',').map((s) => s.trim()).filter(Boolean);
}
