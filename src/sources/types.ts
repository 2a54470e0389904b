/**
 * src/sources/types.ts
 *
 * Shared types for search backends and the queries they run.
 */

// ─── Search Query ─────────────────────────────────────────────────────────────

/** One (role, location) pair from the target lists. */
export interface CrossProductQuery {
    kind: 'cross_product';
    role: string;
    location: string;
    text: string;           // e.g. site:job-boards.greenhouse.io "data analyst" "Boston"
}

/** A fixed, broader search phrase independent of the target lists. */
export interface PatternQuery {
    kind: 'pattern';
    text: string;
}

export type SearchQuery = CrossProductQuery | PatternQuery;

// ─── Raw Result ───────────────────────────────────────────────────────────────

/**
 * A single hit as a backend returns it. HTML backends only know the hyperlink
 * and its text; API backends also supply title and snippet.
 */
export interface RawResult {
    link: string;
    text?: string;
    title?: string;
    snippet?: string;
}

// ─── Backend ──────────────────────────────────────────────────────────────────

export interface SearchBackend {
    readonly name: string;
    /** Resolves to [] on any failure; never rejects. */
    search(query: SearchQuery): Promise<RawResult[]>;
}

export type BackendKind = 'html' | 'api';
