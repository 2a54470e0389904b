import type { Env } from '../config/env.js';
import { createDuckDuckGoBackend } from './duckduckgoHtml.js';
import { createSerpApiBackend } from './serpApi.js';
import type { FetchText } from '../utils/http.js';
import type { SearchBackend } from './types.js';

export type BackendConfig = Pick<
    Env,
    | 'SEARCH_BACKEND'
    | 'SEARCH_API_KEY'
    | 'SEARCH_API_URL'
    | 'HTML_SEARCH_URL'
    | 'USER_AGENT'
    | 'PROXY_URL'
    | 'QUERY_DELAY_MS'
    | 'REQUEST_TIMEOUT_MS'
>;

export interface BackendOverrides {
    fetchText?: FetchText;
    sleep?: (ms: number) => Promise<void>;
}

/** Picks the search strategy named by SEARCH_BACKEND. */
export function createSearchBackend(config: BackendConfig, overrides: BackendOverrides = {}): SearchBackend {
    const shared = {
        userAgent: config.USER_AGENT,
        timeoutMs: config.REQUEST_TIMEOUT_MS,
        delayMs: config.QUERY_DELAY_MS,
        proxyUrl: config.PROXY_URL || undefined,
        ...overrides,
    };

    if (config.SEARCH_BACKEND === 'api') {
        return createSerpApiBackend({
            ...shared,
            endpoint: config.SEARCH_API_URL,
            apiKey: config.SEARCH_API_KEY,
        });
    }

    return createDuckDuckGoBackend({ ...shared, searchUrl: config.HTML_SEARCH_URL });
}

export type { SearchBackend, SearchQuery, RawResult } from './types.js';
