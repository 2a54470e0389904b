/**
 * src/discovery/normalizer.ts
 *
 * Turns one raw search hit into a JobRecord, or rejects it (null) when the
 * link is not a Greenhouse posting. Unknown company or role never rejects.
 */

import { isGreenhousePostingLink } from '../config/greenhouse.js';
import type { RawResult, SearchQuery } from '../sources/types.js';
import { extractCompany } from './companyExtractor.js';
import { createPatternRoleInference, matchRole, type RoleInference } from './roleInference.js';
import { BROAD_LOCATION, DIRECT_LOCATION, NO_DATA, UNKNOWN, type JobRecord } from './types.js';

/** The page a direct-scrape run reads its links from. */
export interface DirectSource {
    kind: 'direct';
    url: string;
}

export interface NormalizeContext {
    query: SearchQuery | DirectSource;
    targetRoles: readonly string[];
    foundAt: string;
    /** Used for pattern queries only; defaults to matching the pattern text. */
    roleInference?: RoleInference;
}

const patternRoleInference = createPatternRoleInference();

async function resolveRole(raw: RawResult, context: NormalizeContext): Promise<string> {
    const { query } = context;
    switch (query.kind) {
        case 'cross_product':
            return query.role;
        case 'pattern':
            return (context.roleInference ?? patternRoleInference).inferRole(query, raw, context.targetRoles);
        case 'direct':
            return matchRole(raw.text ?? '', context.targetRoles) ?? UNKNOWN;
    }
}

function resolveLocation(query: SearchQuery | DirectSource): string {
    switch (query.kind) {
        case 'cross_product':
            return query.location;
        case 'pattern':
            return BROAD_LOCATION;
        case 'direct':
            return DIRECT_LOCATION;
    }
}

export async function normalizeResult(raw: RawResult, context: NormalizeContext): Promise<JobRecord | null> {
    const link = raw.link.trim();
    if (!isGreenhousePostingLink(link)) return null;

    return {
        link,
        company: extractCompany(link) ?? UNKNOWN,
        roleMatched: await resolveRole({ ...raw, link }, context),
        locationSearched: resolveLocation(context.query),
        foundAt: context.foundAt,
        title: raw.title?.trim() || NO_DATA,
        snippet: raw.snippet?.trim() || NO_DATA,
    };
}
