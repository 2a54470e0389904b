/**
 * src/discovery/roleInference.ts
 *
 * Decides which target role a pattern-query hit belongs to. Cross-product hits
 * never get here: their role is the one the query was built from.
 *
 * Two strategies, one per run (ROLE_INFERENCE):
 *   pattern: look for a target role inside the pattern text itself (no I/O)
 *   page:    fetch the posting and look for a target role in its body
 */

import { log } from 'crawlee';
import { fetchText as defaultFetchText, isOk, type FetchText } from '../utils/http.js';
import type { PatternQuery, RawResult } from '../sources/types.js';
import { findRecencyIndicator, isLikelyRecent } from './freshness.js';
import { UNKNOWN } from './types.js';

export type RoleInferenceStrategy = 'pattern' | 'page';

export interface RoleInference {
    readonly strategy: RoleInferenceStrategy;
    inferRole(query: PatternQuery, raw: RawResult, targetRoles: readonly string[]): Promise<string>;
}

/** First target role (in configured order) that occurs in `text`, case-insensitively. */
export function matchRole(text: string, targetRoles: readonly string[]): string | null {
    const lower = text.toLowerCase();
    return targetRoles.find((role) => role.trim() !== '' && lower.includes(role.toLowerCase())) ?? null;
}

export function createPatternRoleInference(): RoleInference {
    return {
        strategy: 'pattern',
        async inferRole(query, _raw, targetRoles) {
            return matchRole(query.text, targetRoles) ?? UNKNOWN;
        },
    };
}

export interface PageRoleInferenceOptions {
    userAgent: string;
    timeoutMs: number;
    proxyUrl?: string;
    fetchText?: FetchText;
}

export function createPageRoleInference(options: PageRoleInferenceOptions): RoleInference {
    const fetchText = options.fetchText ?? defaultFetchText;
    // The same posting often surfaces under several patterns in one run.
    const pageRoles = new Map<string, string>();

    async function lookup(link: string, targetRoles: readonly string[]): Promise<string> {
        try {
            const response = await fetchText(link, {
                headers: { 'User-Agent': options.userAgent },
                timeoutMs: options.timeoutMs,
                proxyUrl: options.proxyUrl,
            });
            if (!isOk(response.status)) {
                log.debug(`[RoleInference] HTTP ${response.status} for ${link}`);
                return UNKNOWN;
            }
            log.debug(
                `[RoleInference] ${link} likelyRecent=${isLikelyRecent(response.body)} ` +
                `indicator=${findRecencyIndicator(response.body) ?? 'none'}`
            );
            return matchRole(response.body, targetRoles) ?? UNKNOWN;
        } catch (err) {
            log.debug(`[RoleInference] Fetch failed for ${link}: ${err instanceof Error ? err.message : String(err)}`);
            return UNKNOWN;
        }
    }

    return {
        strategy: 'page',
        async inferRole(_query, raw, targetRoles) {
            const cached = pageRoles.get(raw.link);
            if (cached !== undefined) return cached;
            const role = await lookup(raw.link, targetRoles);
            pageRoles.set(raw.link, role);
            return role;
        },
    };
}
