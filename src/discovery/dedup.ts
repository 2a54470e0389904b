import type { JobRecord } from './types.js';

/**
 * Keeps the first record seen for each link, then drops links already in
 * the ledger. Order of the survivors follows the input order.
 */
export function dedupe(candidates: readonly JobRecord[], existingLinks: ReadonlySet<string>): JobRecord[] {
    const seen = new Set<string>();
    const unique: JobRecord[] = [];

    for (const record of candidates) {
        if (seen.has(record.link)) continue;
        seen.add(record.link);
        unique.push(record);
    }

    return unique.filter((record) => !existingLinks.has(record.link));
}

/** Same first-occurrence collapse without the ledger filter. */
export function uniqueByLink(candidates: readonly JobRecord[]): JobRecord[] {
    return dedupe(candidates, new Set());
}
