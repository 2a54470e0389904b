import { GreenhouseMarkers } from '../config/greenhouse.js';

/**
 * Derives the company slug from a posting link: the path segment right after
 * the greenhouse.io host segment, lower-cased and trimmed.
 *
 *   https://job-boards.greenhouse.io/Acme/jobs/123  →  "acme"
 *   https://job-boards.greenhouse.io/jobs/123       →  null
 *
 * Returns null when no slug can be derived; never throws.
 */
export function extractCompany(link: string): string | null {
    if (typeof link !== 'string') return null;

    const parts = link.split('/');
    const hostIndex = parts.findIndex((part) => part.includes(GreenhouseMarkers.domainToken));
    if (hostIndex === -1 || hostIndex + 1 >= parts.length) return null;

    const candidate = parts[hostIndex + 1].split(/[?#]/)[0].trim().toLowerCase();
    if (GreenhouseMarkers.structuralSegments.includes(candidate)) return null;

    return candidate;
}
