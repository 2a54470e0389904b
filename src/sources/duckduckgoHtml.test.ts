import { describe, it, expect } from 'vitest';
import { createDuckDuckGoBackend, extractResultLinks, unwrapRedirect } from './duckduckgoHtml.js';
import type { FetchText, FetchTextOptions } from '../utils/http.js';
import type { SearchQuery } from './types.js';

const query: SearchQuery = {
    kind: 'cross_product',
    role: 'data analyst',
    location: 'Boston',
    text: 'site:job-boards.greenhouse.io "data analyst" "Boston"',
};

const RESULTS_PAGE = `
<html><body>
  <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fjob-boards.greenhouse.io%2Facme%2Fjobs%2F123&amp;rut=abc">
    Data Analyst -   Acme
  </a>
  <a href="https://job-boards.greenhouse.io/beta/jobs/456">Beta</a>
  <a href="/settings"></a>
  <a name="no-href">anchor</a>
</body></html>`;

describe('unwrapRedirect', () => {
    it('returns the uddg target of a redirect link', () => {
        expect(unwrapRedirect('//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fa&rut=1')).toBe('https://example.com/a');
    });

    it('leaves ordinary links untouched', () => {
        expect(unwrapRedirect('https://job-boards.greenhouse.io/acme/jobs/1')).toBe('https://job-boards.greenhouse.io/acme/jobs/1');
    });
});

describe('extractResultLinks', () => {
    it('returns every href on the page in document order, redirects unwrapped', () => {
        expect(extractResultLinks(RESULTS_PAGE)).toEqual([
            { link: 'https://job-boards.greenhouse.io/acme/jobs/123', text: 'Data Analyst - Acme' },
            { link: 'https://job-boards.greenhouse.io/beta/jobs/456', text: 'Beta' },
            { link: '/settings' },
        ]);
    });
});

describe('DuckDuckGo backend', () => {
    function setup(respond: FetchText) {
        const calls: Array<{ url: string; options: FetchTextOptions }> = [];
        const sleeps: number[] = [];
        const backend = createDuckDuckGoBackend({
            searchUrl: 'https://duckduckgo.com/html/',
            userAgent: 'test-agent',
            timeoutMs: 500,
            delayMs: 1500,
            fetchText: async (url, options) => {
                calls.push({ url, options });
                return respond(url, options);
            },
            sleep: async (ms) => {
                sleeps.push(ms);
            },
        });
        return { backend, calls, sleeps };
    }

    it('puts the query text in the q parameter and sends the user agent', async () => {
        const { backend, calls } = setup(async () => ({ status: 200, body: RESULTS_PAGE }));

        const results = await backend.search(query);

        expect(results).toHaveLength(3);
        expect(new URL(calls[0].url).searchParams.get('q')).toBe(query.text);
        expect(calls[0].options.headers).toEqual({ 'User-Agent': 'test-agent' });
        expect(calls[0].options.timeoutMs).toBe(500);
    });

    it('waits the polite delay after a successful query', async () => {
        const { backend, sleeps } = setup(async () => ({ status: 200, body: RESULTS_PAGE }));
        await backend.search(query);
        expect(sleeps).toEqual([1500]);
    });

    it('returns [] and still waits on a non-200 response', async () => {
        const { backend, sleeps } = setup(async () => ({ status: 429, body: 'slow down' }));
        expect(await backend.search(query)).toEqual([]);
        expect(sleeps).toEqual([1500]);
    });

    it('returns [] when the request fails', async () => {
        const { backend } = setup(async () => {
            throw new Error('ETIMEDOUT');
        });
        expect(await backend.search(query)).toEqual([]);
    });
});
