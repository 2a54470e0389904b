import { buildSiteQuery } from '../config/greenhouse.js';
import type { SearchQuery } from '../sources/types.js';

/**
 * Every (role, location) pair, roles outer and locations inner, followed by
 * the pattern queries in their configured order. Queries are not
 * deduplicated against each other.
 */
export function planQueries(
    roles: readonly string[],
    locations: readonly string[],
    patterns: readonly string[],
): SearchQuery[] {
    const queries: SearchQuery[] = [];

    for (const role of roles) {
        for (const location of locations) {
            queries.push({ kind: 'cross_product', role, location, text: buildSiteQuery(role, location) });
        }
    }

    for (const text of patterns) {
        queries.push({ kind: 'pattern', text });
    }

    return queries;
}

export function describeQuery(query: SearchQuery): string {
    return query.kind === 'cross_product'
        ? `${query.role} in ${query.location}`
        : `pattern ${query.text}`;
}
