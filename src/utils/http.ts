/**
 * src/utils/http.ts
 *
 * Minimal text fetcher shared by the search backends and the posting-page
 * role lookup. Goes through got-scraping when a proxy is configured, plain
 * fetch otherwise.
 */

export interface FetchTextOptions {
    headers?: Record<string, string>;
    timeoutMs: number;
    proxyUrl?: string;
}

export interface TextResponse {
    status: number;
    body: string;
}

export type FetchText = (url: string, options: FetchTextOptions) => Promise<TextResponse>;

/** Rejects on network failure or timeout; non-2xx statuses resolve normally. */
export const fetchText: FetchText = async (url, options) => {
    const headers = options.headers ?? {};

    if (options.proxyUrl) {
        const { gotScraping } = await import('got-scraping');
        const response = await gotScraping({
            url,
            proxyUrl: options.proxyUrl,
            headers,
            timeout: { request: options.timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
        });
        return { status: response.statusCode, body: response.body };
    }

    const response = await fetch(url, { headers, signal: AbortSignal.timeout(options.timeoutMs) });
    return { status: response.status, body: await response.text() };
};

export function isOk(status: number): boolean {
    return status >= 200 && status < 300;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
