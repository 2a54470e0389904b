/**
 * src/orchestrator.ts
 *
 * One discovery run, end to end:
 *
 *   1. Load the ledger's known links
 *   2. Collect candidates from search queries through the backend, or a single
 *      page in direct-scrape mode
 *   3. Dedupe: first occurrence per link, minus links already recorded
 *   4. Append the survivors to the ledger
 *   5. Log the summary
 *
 * Search and parsing problems are absorbed along the way. Only a failed
 * ledger write rejects, since the run's findings would otherwise be lost.
 */

import { log } from 'crawlee';
import { scrapeTargetUrl, type DirectScrapeOptions } from './discovery/directScrape.js';
import { createDiscoveryEngine } from './discovery/engine.js';
import { dedupe, uniqueByLink } from './discovery/dedup.js';
import type { RoleInference } from './discovery/roleInference.js';
import type { JobRecord } from './discovery/types.js';
import type { Ledger } from './ledger/csvLedger.js';
import type { SearchBackend } from './sources/types.js';
import { createRunContext, type RunContext } from './utils/runContext.js';
import { countByRole, logRunSummary, type RunSummary } from './utils/runSummary.js';

export interface RunOptions {
    roles: readonly string[];
    locations: readonly string[];
    patterns: readonly string[];
    /** When set, scrape this page instead of running search queries. */
    targetUrl?: string;
    backend: SearchBackend;
    ledger: Ledger;
    roleInference: RoleInference;
    direct: Omit<DirectScrapeOptions, 'foundAt'>;
    context?: RunContext;
}

export interface RunResult extends RunSummary {
    runId: string;
    appendedRecords: JobRecord[];
}

async function collectCandidates(options: RunOptions, context: RunContext): Promise<JobRecord[]> {
    if (options.targetUrl) {
        log.info(`[Run] Direct scrape of ${options.targetUrl}`);
        return scrapeTargetUrl(options.targetUrl, options.roles, { ...options.direct, foundAt: context.foundAt });
    }

    const engine = createDiscoveryEngine({
        backend: options.backend,
        patterns: options.patterns,
        roleInference: options.roleInference,
        foundAt: context.foundAt,
    });
    return engine.discover(options.roles, options.locations);
}

export async function runDiscovery(options: RunOptions): Promise<RunResult> {
    const context = options.context ?? createRunContext();
    log.info(`[Run] ${context.runId} started at ${context.foundAt}`);

    const existingLinks = await options.ledger.load();

    const candidates = await collectCandidates(options, context);
    const unique = uniqueByLink(candidates);

    const fresh = dedupe(unique, existingLinks);
    log.info(`[Run] ${unique.length - fresh.length} of ${unique.length} unique links already recorded`);

    const appended = await options.ledger.append(fresh);

    const summary: RunSummary = {
        candidates: candidates.length,
        unique: unique.length,
        appended,
        byRole: countByRole(unique),
    };
    logRunSummary(summary);

    return { ...summary, runId: context.runId, appendedRecords: fresh };
}
