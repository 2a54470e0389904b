/**
 * src/discovery/directScrape.ts
 *
 * Direct-scrape mode: read a single page (typically a company's board,
 * e.g. https://job-boards.greenhouse.io/acme) and keep every posting link on it.
 * No search engine involved.
 */

import { log } from 'crawlee';
import { extractHyperlinks } from '../utils/html.js';
import { fetchText as defaultFetchText, isOk, type FetchText } from '../utils/http.js';
import { normalizeResult } from './normalizer.js';
import type { JobRecord } from './types.js';

export interface DirectScrapeOptions {
    userAgent: string;
    timeoutMs: number;
    foundAt: string;
    proxyUrl?: string;
    fetchText?: FetchText;
}

function toAbsolute(href: string, base: string): string | null {
    try {
        return new URL(href, base).toString();
    } catch {
        return null;
    }
}

export async function scrapeTargetUrl(
    url: string,
    targetRoles: readonly string[],
    options: DirectScrapeOptions,
): Promise<JobRecord[]> {
    const fetchText = options.fetchText ?? defaultFetchText;

    let html: string;
    try {
        const response = await fetchText(url, {
            headers: { 'User-Agent': options.userAgent },
            timeoutMs: options.timeoutMs,
            proxyUrl: options.proxyUrl,
        });
        if (!isOk(response.status)) {
            log.warning(`[DirectScrape] HTTP ${response.status} for ${url}`);
            return [];
        }
        html = response.body;
    } catch (err) {
        log.error(`[DirectScrape] ✗ Failed to fetch ${url}: ${err instanceof Error ? err.message : String(err)}`);
        return [];
    }

    const records: JobRecord[] = [];
    for (const raw of extractHyperlinks(html)) {
        const link = toAbsolute(raw.link, url);
        if (!link) continue;
        const record = await normalizeResult(
            { ...raw, link },
            { query: { kind: 'direct', url }, targetRoles, foundAt: options.foundAt },
        );
        if (record) records.push(record);
    }

    log.info(`[DirectScrape] ✓ ${records.length} posting links on ${url}`);
    return records;
}
