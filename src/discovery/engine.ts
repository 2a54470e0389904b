/**
 * src/discovery/engine.ts
 *
 * Runs the planned queries one after another against the configured backend
 * and collects every normalized candidate, in query order then result order.
 *
 * A failed query simply contributes nothing; it is not retried within the run.
 */

import { log } from 'crawlee';
import type { SearchBackend } from '../sources/types.js';
import { normalizeResult } from './normalizer.js';
import { describeQuery, planQueries } from './queryPlanner.js';
import type { RoleInference } from './roleInference.js';
import type { JobRecord } from './types.js';

export interface DiscoveryEngineOptions {
    backend: SearchBackend;
    patterns: readonly string[];
    roleInference: RoleInference;
    foundAt: string;
}

export interface DiscoveryEngine {
    discover(roles: readonly string[], locations: readonly string[]): Promise<JobRecord[]>;
}

export function createDiscoveryEngine(options: DiscoveryEngineOptions): DiscoveryEngine {
    const { backend, patterns, roleInference, foundAt } = options;

    return {
        async discover(roles, locations) {
            const queries = planQueries(roles, locations, patterns);
            const candidates: JobRecord[] = [];

            log.info(`[Discovery] ${queries.length} queries via ${backend.name} (role inference: ${roleInference.strategy})`);

            for (const query of queries) {
                log.info(`[Discovery] Searching: ${describeQuery(query)}`);
                const rawResults = await backend.search(query);

                let accepted = 0;
                for (const raw of rawResults) {
                    try {
                        const record = await normalizeResult(raw, { query, targetRoles: roles, foundAt, roleInference });
                        if (record) {
                            candidates.push(record);
                            accepted++;
                        }
                    } catch (err) {
                        log.warning(`[Discovery] Skipped result ${raw.link}: ${err instanceof Error ? err.message : String(err)}`);
                    }
                }

                log.debug(`[Discovery]   → ${accepted}/${rawResults.length} results were postings`);
            }

            log.info(`[Discovery] ✓ ${candidates.length} candidates collected`);
            return candidates;
        },
    };
}
