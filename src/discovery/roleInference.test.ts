import { describe, it, expect } from 'vitest';
import { createPageRoleInference, createPatternRoleInference, matchRole } from './roleInference.js';
import type { FetchText } from '../utils/http.js';
import type { PatternQuery } from '../sources/types.js';

const ROLES = ['data scientist', 'data analyst', 'ai engineer'];
const query: PatternQuery = { kind: 'pattern', text: 'site:job-boards.greenhouse.io "AI Engineer" "posted" "US"' };
const LINK = 'https://job-boards.greenhouse.io/acme/jobs/1';

describe('matchRole', () => {
    it('returns the first configured role contained in the text', () => {
        expect(matchRole('We need a Data Analyst and a Data Scientist', ROLES)).toBe('data scientist');
    });

    it('returns null when no role occurs', () => {
        expect(matchRole('Product Manager', ROLES)).toBeNull();
    });

    it('ignores blank roles', () => {
        expect(matchRole('anything', ['  '])).toBeNull();
    });
});

describe('pattern role inference', () => {
    it('matches against the pattern text', async () => {
        const inference = createPatternRoleInference();
        expect(await inference.inferRole(query, { link: LINK }, ROLES)).toBe('ai engineer');
    });
});

describe('page role inference', () => {
    it('matches against the fetched page body', async () => {
        const fetchText: FetchText = async () => ({ status: 200, body: '<h1>Senior Data Analyst</h1>' });
        const inference = createPageRoleInference({ userAgent: 'test-agent', timeoutMs: 100, fetchText });
        expect(await inference.inferRole(query, { link: LINK }, ROLES)).toBe('data analyst');
    });

    it('fetches each posting once per run', async () => {
        let calls = 0;
        const fetchText: FetchText = async () => {
            calls++;
            return { status: 200, body: 'data scientist' };
        };
        const inference = createPageRoleInference({ userAgent: 'test-agent', timeoutMs: 100, fetchText });
        await inference.inferRole(query, { link: LINK }, ROLES);
        await inference.inferRole(query, { link: LINK }, ROLES);
        expect(calls).toBe(1);
    });

    it('sends the configured user agent', async () => {
        const headers: Array<Record<string, string> | undefined> = [];
        const fetchText: FetchText = async (_url, options) => {
            headers.push(options.headers);
            return { status: 200, body: '' };
        };
        const inference = createPageRoleInference({ userAgent: 'test-agent', timeoutMs: 100, fetchText });
        await inference.inferRole(query, { link: LINK }, ROLES);
        expect(headers).toEqual([{ 'User-Agent': 'test-agent' }]);
    });

    it('returns "unknown" on a non-200 page', async () => {
        const fetchText: FetchText = async () => ({ status: 404, body: 'data analyst' });
        const inference = createPageRoleInference({ userAgent: 'test-agent', timeoutMs: 100, fetchText });
        expect(await inference.inferRole(query, { link: LINK }, ROLES)).toBe('unknown');
    });

    it('returns "unknown" when the fetch fails', async () => {
        const fetchText: FetchText = async () => {
            throw new Error('socket hang up');
        };
        const inference = createPageRoleInference({ userAgent: 'test-agent', timeoutMs: 100, fetchText });
        expect(await inference.inferRole(query, { link: LINK }, ROLES)).toBe('unknown');
    });
});
