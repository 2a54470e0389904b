/**
 * Best-effort recency signal for a posting page. Greenhouse pages rarely say
 * how old they are, so absence of an indicator is not evidence of staleness:
 * isLikelyRecent() never rejects a posting.
 */

export const RECENT_INDICATORS = [
    'posted today',
    'posted 1 hour',
    'posted 2 hour',
    'new posting',
    'just posted',
    '1 hr ago',
    '2 hrs ago',
] as const;

export function findRecencyIndicator(text: string): string | null {
    const lower = text.toLowerCase();
    return RECENT_INDICATORS.find((indicator) => lower.includes(indicator)) ?? null;
}

export function isLikelyRecent(_text: string): boolean {
    return true;
}
