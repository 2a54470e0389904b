import { describe, it, expect } from 'vitest';
import { createDiscoveryEngine } from './engine.js';
import { createPatternRoleInference } from './roleInference.js';
import type { RawResult, SearchBackend, SearchQuery } from '../sources/types.js';

const FOUND_AT = '2026-10-18 07:00:00';

function fakeBackend(respond: (query: SearchQuery) => RawResult[]): SearchBackend & { queries: SearchQuery[] } {
    const queries: SearchQuery[] = [];
    return {
        name: 'fake',
        queries,
        async search(query) {
            queries.push(query);
            return respond(query);
        },
    };
}

function engineFor(backend: SearchBackend, patterns: string[]) {
    return createDiscoveryEngine({
        backend,
        patterns,
        roleInference: createPatternRoleInference(),
        foundAt: FOUND_AT,
    });
}

describe('DiscoveryEngine', () => {
    it('turns a cross-product hit into a record', async () => {
        const backend = fakeBackend((query) =>
            query.kind === 'cross_product'
                ? [{ link: 'https://job-boards.greenhouse.io/acme/jobs/123' }]
                : [],
        );
        const engine = engineFor(backend, ['site:job-boards.greenhouse.io "machine learning" "new" "US"']);

        const records = await engine.discover(['data analyst'], ['Boston']);

        expect(backend.queries).toHaveLength(2);
        expect(records).toEqual([
            {
                link: 'https://job-boards.greenhouse.io/acme/jobs/123',
                company: 'acme',
                roleMatched: 'data analyst',
                locationSearched: 'Boston',
                foundAt: FOUND_AT,
                title: 'n/a',
                snippet: 'n/a',
            },
        ]);
    });

    it('keeps going when one query of three fails', async () => {
        const backend = fakeBackend((query) => {
            if (query.kind === 'cross_product' && query.location === 'Atlanta') return [];
            const id = query.kind === 'cross_product' ? query.location.toLowerCase() : 'pattern';
            return [{ link: `https://job-boards.greenhouse.io/${id}/jobs/1` }];
        });
        const engine = engineFor(backend, ['site:job-boards.greenhouse.io "data analyst" "hiring" "US"']);

        const records = await engine.discover(['data analyst'], ['Boston', 'Atlanta']);

        expect(backend.queries).toHaveLength(3);
        expect(records.map((r) => r.link)).toEqual([
            'https://job-boards.greenhouse.io/boston/jobs/1',
            'https://job-boards.greenhouse.io/pattern/jobs/1',
        ]);
        expect(records[1].roleMatched).toBe('data analyst');
        expect(records[1].locationSearched).toBe('broad');
    });

    it('keeps query order then result order, duplicates included', async () => {
        const backend = fakeBackend((query) => {
            if (query.kind !== 'cross_product') return [];
            return [
                { link: `https://job-boards.greenhouse.io/${query.location}/jobs/1` },
                { link: 'https://duckduckgo.com/settings' },
                { link: 'https://job-boards.greenhouse.io/shared/jobs/7' },
            ];
        });
        const engine = engineFor(backend, []);

        const records = await engine.discover(['a'], ['x', 'y']);

        expect(records.map((r) => r.link)).toEqual([
            'https://job-boards.greenhouse.io/x/jobs/1',
            'https://job-boards.greenhouse.io/shared/jobs/7',
            'https://job-boards.greenhouse.io/y/jobs/1',
            'https://job-boards.greenhouse.io/shared/jobs/7',
        ]);
    });

    it('skips a candidate whose role lookup throws and keeps the rest', async () => {
        const backend = fakeBackend(() => [
            { link: 'https://job-boards.greenhouse.io/bad/jobs/1' },
            { link: 'https://job-boards.greenhouse.io/good/jobs/2' },
        ]);
        const engine = createDiscoveryEngine({
            backend,
            patterns: ['site:job-boards.greenhouse.io "a"'],
            foundAt: FOUND_AT,
            roleInference: {
                strategy: 'page',
                async inferRole(_query, raw) {
                    if (raw.link.includes('/bad/')) throw new Error('boom');
                    return 'a';
                },
            },
        });

        const records = await engine.discover(['a'], []);

        expect(records.map((r) => r.link)).toEqual(['https://job-boards.greenhouse.io/good/jobs/2']);
    });
});
