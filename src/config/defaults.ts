import { readFileSync } from 'node:fs';
import { z } from 'zod';

const defaultsSchema = z.object({
    roles: z.array(z.string().min(1)),
    locations: z.array(z.string().min(1)),
    patterns: z.array(z.string().min(1)),
});

export type SearchDefaults = z.infer<typeof defaultsSchema>;

const DEFAULTS_URL = new URL('../../config/search-defaults.json', import.meta.url);

let cached: SearchDefaults | null = null;

/** Target roles, locations and pattern queries used when nothing is configured. */
export function getSearchDefaults(): SearchDefaults {
    if (cached === null) {
        cached = defaultsSchema.parse(JSON.parse(readFileSync(DEFAULTS_URL, 'utf-8')));
    }
    return cached;
}
