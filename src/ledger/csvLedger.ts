/**
 * src/ledger/csvLedger.ts
 *
 * Append-only CSV ledger of every posting ever discovered.
 *
 * ON DISK
 * ───────
 *   link,company,role_matched,location_searched,found_at,title,snippet
 *   https://job-boards.greenhouse.io/acme/jobs/123,acme,data analyst,Boston,2026-10-18 07:00:00,n/a,n/a
 *
 * Files written before title/snippet existed keep their five-column header;
 * new rows follow whatever header the file already has.
 *
 * READ:  once per run, only the link column matters. A missing or unreadable
 *         file is an empty ledger. Each line is parsed on its own, so a broken
 *         row (an unclosed quote, say) is skipped without taking later rows
 *         with it. When the first line names no `link` column, every line is
 *         read as a row with the link in column 0, where `append` puts it.
 * WRITE: rows are appended, never rewritten, one line per record (line breaks
 *         inside values become spaces). Failures throw LedgerWriteError.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { log } from 'crawlee';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { JobRecord } from '../discovery/types.js';

// ─── Columns ──────────────────────────────────────────────────────────────────

export const LEDGER_COLUMNS = [
    'link',
    'company',
    'role_matched',
    'location_searched',
    'found_at',
    'title',
    'snippet',
] as const;

const LinkSchema = z.string().trim().min(1);

function columnValue(record: JobRecord, column: string): string {
    switch (column) {
        case 'link': return record.link;
        case 'company': return record.company;
        case 'role_matched': return record.roleMatched;
        case 'location_searched': return record.locationSearched;
        case 'found_at': return record.foundAt;
        case 'title': return record.title;
        case 'snippet': return record.snippet;
        default: return '';
    }
}

function toRows(records: readonly JobRecord[], columns: readonly string[]): string[][] {
    return records.map((record) => columns.map((column) => columnValue(record, column).replace(/[\r\n]+/g, ' ')));
}

// ─── Errors ───────────────────────────────────────────────────────────────────

export class LedgerWriteError extends Error {
    constructor(filePath: string, cause: unknown) {
        super(`Failed to append to ledger ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'LedgerWriteError';
    }
}

// ─── Ledger ───────────────────────────────────────────────────────────────────

export interface Ledger {
    readonly path: string;
    /** Every link already recorded. Never rejects. */
    load(): Promise<Set<string>>;
    /** Appends the records in order and resolves to how many were written. */
    append(records: readonly JobRecord[]): Promise<number>;
}

async function readIfExists(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
        throw err;
    }
}

/** Cells of a single CSV line, or null when the line does not parse. */
function parseLine(line: string): string[] | null {
    let rows: unknown;
    try {
        rows = parse(line, { relax_column_count: true, relax_quotes: true });
    } catch {
        return null;
    }
    if (!Array.isArray(rows) || !Array.isArray(rows[0])) return null;
    return rows[0].map((cell: unknown) => (typeof cell === 'string' ? cell.trim() : ''));
}

function splitLines(content: string): string[] {
    return content.replace(/^\uFEFF/, '').split(/\r?\n/).filter((line) => line.trim() !== '');
}

function parseHeader(content: string): string[] | null {
    const [first] = splitLines(content);
    const header = first === undefined ? null : parseLine(first);
    return header !== null && header.includes('link') ? header : null;
}

export function createCsvLedger(filePath: string): Ledger {
    const resolved = path.resolve(filePath);

    async function load(): Promise<Set<string>> {
        const links = new Set<string>();

        let content: string | null;
        try {
            content = await readIfExists(resolved);
        } catch (err) {
            log.warning(`[Ledger] Could not read ${resolved}; treating as empty. (${err instanceof Error ? err.message : String(err)})`);
            return links;
        }
        if (content === null) {
            log.info(`[Ledger] ${resolved} does not exist yet; starting fresh.`);
            return links;
        }

        const lines = splitLines(content);
        const header = parseHeader(content);
        const linkIndex = header === null ? 0 : header.indexOf('link');
        let skipped = 0;

        for (const line of header === null ? lines : lines.slice(1)) {
            const cells = parseLine(line);
            const parsed = LinkSchema.safeParse(cells?.[linkIndex]);
            if (parsed.success) {
                links.add(parsed.data);
            } else {
                skipped++;
            }
        }

        if (header === null && lines.length > 0) {
            log.warning(`[Ledger] ${resolved} has no link header; reading links from the first column.`);
        }
        if (skipped > 0) log.debug(`[Ledger] Skipped ${skipped} unreadable rows in ${resolved}.`);
        log.info(`[Ledger] Loaded ${links.size} known links from ${resolved}.`);
        return links;
    }

    async function append(records: readonly JobRecord[]): Promise<number> {
        if (records.length === 0) return 0;

        try {
            const existing = await readIfExists(resolved);
            if (existing === null || existing.trim() === '') {
                const chunk = stringify([[...LEDGER_COLUMNS], ...toRows(records, LEDGER_COLUMNS)]);
                await fs.mkdir(path.dirname(resolved), { recursive: true });
                await fs.writeFile(resolved, chunk, 'utf-8');
            } else {
                const columns = parseHeader(existing) ?? LEDGER_COLUMNS;
                const separator = existing.endsWith('\n') ? '' : '\n';
                await fs.appendFile(resolved, separator + stringify(toRows(records, columns)), 'utf-8');
            }
        } catch (err) {
            throw new LedgerWriteError(resolved, err);
        }

        log.info(`[Ledger] Appended ${records.length} new links to ${resolved}.`);
        return records.length;
    }

    return { path: resolved, load, append };
}
