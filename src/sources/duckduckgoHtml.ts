/**
 * src/sources/duckduckgoHtml.ts
 *
 * HTML-scrape search backend: DuckDuckGo's JavaScript-free results page.
 *
 * Every hyperlink on the page becomes a raw result; filtering down to job
 * postings happens in the normalizer. DuckDuckGo routes result clicks through
 * `/l/?uddg=<target>` redirects, which are unwrapped here so the normalizer
 * sees the real posting URL.
 */

import { log } from 'crawlee';
import { extractHyperlinks } from '../utils/html.js';
import { fetchText as defaultFetchText, isOk, sleep as defaultSleep, type FetchText } from '../utils/http.js';
import type { RawResult, SearchBackend, SearchQuery } from './types.js';

const SOURCE_NAME = 'duckduckgo_html';

export interface HtmlBackendOptions {
    searchUrl: string;
    userAgent: string;
    timeoutMs: number;
    delayMs: number;
    proxyUrl?: string;
    fetchText?: FetchText;
    sleep?: (ms: number) => Promise<void>;
}

// ─── Link Extraction ──────────────────────────────────────────────────────────

/** Returns the redirect target for DuckDuckGo `/l/?uddg=` links, else the href unchanged. */
export function unwrapRedirect(href: string): string {
    if (!href.includes('uddg=')) return href;
    try {
        const absolute = href.startsWith('//') ? `https:${href}` : href;
        const target = new URL(absolute, 'https://duckduckgo.com').searchParams.get('uddg');
        return target ?? href;
    } catch {
        return href;
    }
}

/** Result links on a DuckDuckGo page, redirects unwrapped. */
export function extractResultLinks(html: string): RawResult[] {
    return extractHyperlinks(html).map((hyperlink) => ({ ...hyperlink, link: unwrapRedirect(hyperlink.link) }));
}

// ─── Backend ──────────────────────────────────────────────────────────────────

export function createDuckDuckGoBackend(options: HtmlBackendOptions): SearchBackend {
    const fetchText = options.fetchText ?? defaultFetchText;
    const sleep = options.sleep ?? defaultSleep;

    async function runQuery(query: SearchQuery): Promise<RawResult[]> {
        const url = `${options.searchUrl}?${new URLSearchParams({ q: query.text }).toString()}`;
        try {
            const response = await fetchText(url, {
                headers: { 'User-Agent': options.userAgent },
                timeoutMs: options.timeoutMs,
                proxyUrl: options.proxyUrl,
            });
            if (!isOk(response.status)) {
                log.warning(`[DuckDuckGo] HTTP ${response.status} for ${query.text}`);
                return [];
            }
            const results = extractResultLinks(response.body);
            log.debug(`[DuckDuckGo] ${results.length} links for ${query.text}`);
            return results;
        } catch (err) {
            log.error(`[DuckDuckGo] ✗ Search failed for ${query.text}: ${err instanceof Error ? err.message : String(err)}`);
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
