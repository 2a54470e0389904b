/**
 * src/sources/serpApi.ts
 *
 * API search backend: SerpApi's Google engine.
 *
 * GET {endpoint}?engine=google&q=...&api_key=... returns JSON whose
 * `organic_results` entries carry link, title and snippet. The body is
 * validated with zod; entries without a link are dropped.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { fetchText as defaultFetchText, isOk, sleep as defaultSleep, type FetchText } from '../utils/http.js';
import type { RawResult, SearchBackend, SearchQuery } from './types.js';

const SOURCE_NAME = 'serpapi';

const OrganicResultSchema = z.object({
    link: z.string().optional(),
    title: z.string().optional(),
    snippet: z.string().optional(),
});

const SerpApiResponseSchema = z.object({
    error: z.string().optional(),
    organic_results: z.array(OrganicResultSchema).optional(),
});

export interface ApiBackendOptions {
    endpoint: string;
    apiKey: string;
    userAgent: string;
    timeoutMs: number;
    delayMs: number;
    proxyUrl?: string;
    fetchText?: FetchText;
    sleep?: (ms: number) => Promise<void>;
}

/** Maps a SerpApi body to raw results. Throws on non-JSON or schema mismatch. */
export function parseSerpApiBody(body: string): RawResult[] {
    const data = SerpApiResponseSchema.parse(JSON.parse(body));
    if (data.error) {
        throw new Error(`API error: ${data.error}`);
    }

    const results: RawResult[] = [];
    for (const entry of data.organic_results ?? []) {
        if (!entry.link) continue;
        results.push({
            link: entry.link,
            ...(entry.title ? { title: entry.title } : {}),
            ...(entry.snippet ? { snippet: entry.snippet } : {}),
        });
    }
    return results;
}

export function createSerpApiBackend(options: ApiBackendOptions): SearchBackend {
    const fetchText = options.fetchText ?? defaultFetchText;
    const sleep = options.sleep ?? defaultSleep;

    async function runQuery(query: SearchQuery): Promise<RawResult[]> {
        const params = new URLSearchParams({
            engine: 'google',
            q: query.text,
            api_key: options.apiKey,
        });
        try {
            const response = await fetchText(`${options.endpoint}?${params.toString()}`, {
                headers: { 'User-Agent': options.userAgent, Accept: 'application/json' },
                timeoutMs: options.timeoutMs,
                proxyUrl: options.proxyUrl,
            });
            if (!isOk(response.status)) {
                const hint = response.status === 429 ? ' (rate limited)' : '';
                log.warning(`[SerpApi] HTTP ${response.status}${hint} for ${query.text}`);
                return [];
            }
            const results = parseSerpApiBody(response.body);
            log.debug(`[SerpApi] ${results.length} organic results for ${query.text}`);
            return results;
        } catch (err) {
            log.error(`[SerpApi] ✗ Search failed for ${query.text}: ${err instanceof Error ? err.message : String(err)}`);
            return [];
        }
    }

    return {
        name: SOURCE_NAME,
        async search(query) {
            const results = await runQuery(query);
            await sleep(options.delayMs);
            return results;
        },
    };
}
