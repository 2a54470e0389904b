import { log } from 'crawlee';
import type { JobRecord } from '../discovery/types.js';

export interface RunSummary {
    candidates: number;
    unique: number;
    appended: number;
    /** role_matched → number of unique links discovered, in first-seen order. */
    byRole: Map<string, number>;
}

export function countByRole(records: readonly JobRecord[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const record of records) {
        counts.set(record.roleMatched, (counts.get(record.roleMatched) ?? 0) + 1);
    }
    return counts;
}

export function logRunSummary(summary: RunSummary): void {
    log.info(`[Summary] Found ${summary.candidates} total links`);
    log.info(`[Summary] Unique links: ${summary.unique}`);
    log.info(`[Summary] Newly recorded: ${summary.appended}`);
    if (summary.byRole.size === 0) return;

    log.info('[Summary] Links by role:');
    for (const [role, count] of summary.byRole) {
        log.info(`[Summary]   ${role}: ${count}`);
    }
}
