import { createPageRoleInference, createPatternRoleInference, type RoleInference } from '../discovery/roleInference.js';
import { createCsvLedger } from '../ledger/csvLedger.js';
import type { RunOptions } from '../orchestrator.js';
import { createSearchBackend, type BackendOverrides } from '../sources/index.js';
import { ConfigError, type Env } from './env.js';
import { parseList, resolveTargets } from './targets.js';

/** Raw command-line flags as commander hands them over. */
export interface CliFlags {
    roles?: string;
    locations?: string;
    url?: string;
    backend?: string;
    ledger?: string;
    verbose?: boolean;
}

/** Folds flags that mirror an environment variable into the raw environment before validation. */
export function applyFlagsToEnv(raw: NodeJS.ProcessEnv, flags: CliFlags): NodeJS.ProcessEnv {
    return {
        ...raw,
        ...(flags.backend ? { SEARCH_BACKEND: flags.backend } : {}),
        ...(flags.ledger ? { LEDGER_PATH: flags.ledger } : {}),
    };
}

function validateTargetUrl(value: string): string {
    try {
        const url = new URL(value);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') throw new Error(url.protocol);
        return url.toString();
    } catch {
        throw new ConfigError(`--url must be an absolute http(s) URL, got "${value}"`);
    }
}

function createRoleInference(env: Env, overrides: BackendOverrides): RoleInference {
    if (env.ROLE_INFERENCE === 'page') {
        return createPageRoleInference({
            userAgent: env.USER_AGENT,
            timeoutMs: env.PAGE_TIMEOUT_MS,
            proxyUrl: env.PROXY_URL || undefined,
            fetchText: overrides.fetchText,
        });
    }
    return createPatternRoleInference();
}

/**
 * Turns validated settings into everything a run needs. Throws ConfigError
 * for combinations the schema alone cannot catch.
 */
export function buildRunOptions(env: Env, flags: CliFlags, overrides: BackendOverrides = {}): RunOptions {
    if (env.SEARCH_BACKEND === 'api' && !env.SEARCH_API_KEY.trim()) {
        throw new ConfigError('SEARCH_API_KEY is required when SEARCH_BACKEND=api');
    }

    const targets = resolveTargets(env, {
        roles: flags.roles !== undefined ? parseList(flags.roles) : undefined,
        locations: flags.locations !== undefined ? parseList(flags.locations) : undefined,
    });

    const targetUrl = flags.url !== undefined ? validateTargetUrl(flags.url) : undefined;
    if (!targetUrl && targets.roles.length === 0 && targets.patterns.length === 0) {
        throw new ConfigError('Nothing to search: no target roles and no pattern queries configured');
    }

    return {
        ...targets,
        targetUrl,
        backend: createSearchBackend(env, overrides),
        ledger: createCsvLedger(env.LEDGER_PATH),
        roleInference: createRoleInference(env, overrides),
        direct: {
            userAgent: env.USER_AGENT,
            timeoutMs: env.REQUEST_TIMEOUT_MS,
            proxyUrl: env.PROXY_URL || undefined,
            fetchText: overrides.fetchText,
        },
    };
}
