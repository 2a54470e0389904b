/**
 * src/discovery/types.ts
 *
 * The job record produced by discovery and persisted in the ledger.
 */

/** Role or company that could not be determined. */
export const UNKNOWN = 'unknown';
/** location_searched for records that came from a pattern query. */
export const BROAD_LOCATION = 'broad';
/** location_searched for records from the direct-scrape mode. */
export const DIRECT_LOCATION = 'direct';
/** title/snippet when the backend supplied none. */
export const NO_DATA = 'n/a';

export interface JobRecord {
    /** Absolute posting URL; the record's identity. */
    link: string;
    company: string;
    roleMatched: string;
    locationSearched: string;
    foundAt: string;        // YYYY-MM-DD HH:MM:SS
    title: string;
    snippet: string;
}
