/**
 * src/config/greenhouse.ts: URL markers for Greenhouse job boards
 */

export const GreenhouseMarkers = {
    /** Host every posting link must contain. */
    host: 'job-boards.greenhouse.io',
    /** Path segment every posting link must contain. */
    postingPath: '/jobs/',
    /** Token used to locate the host segment when splitting a link on "/". */
    domainToken: 'greenhouse.io',
    /** Path segments that belong to Greenhouse's URL scheme, never a company. */
    structuralSegments: ['', 'jobs', 'www', 'job-boards'] as readonly string[],
};

export function isGreenhousePostingLink(link: string): boolean {
    return link.includes(GreenhouseMarkers.host) && link.includes(GreenhouseMarkers.postingPath);
}

export function buildSiteQuery(role: string, location: string): string {
    return `site:${GreenhouseMarkers.host} "${role}" "${location}"`;
}
