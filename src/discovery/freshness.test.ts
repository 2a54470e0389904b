import { describe, it, expect } from 'vitest';
import { findRecencyIndicator, isLikelyRecent } from './freshness.js';

describe('findRecencyIndicator', () => {
    it('finds an indicator regardless of case', () => {
        expect(findRecencyIndicator('<p>Just Posted</p>')).toBe('just posted');
    });

    it('returns null when nothing suggests recency', () => {
        expect(findRecencyIndicator('Senior Data Analyst, Boston')).toBeNull();
    });
});

describe('isLikelyRecent', () => {
    it('is permissive whether or not an indicator is present', () => {
        expect(isLikelyRecent('posted today')).toBe(true);
        expect(isLikelyRecent('posted three months ago')).toBe(true);
    });
});
