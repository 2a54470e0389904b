import { z } from 'zod';

const numFromEnv = (fallback: number, schema: z.ZodNumber = z.number().finite().min(0)) => z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'string') return Number(v);
    return v;
}, schema);

const commaList = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') {
        return v.split(',').map((s) => s.trim()).filter(Boolean);
    }
    return v;
}, z.array(z.string().min(1)).optional());

const patternsJson = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v !== 'string') return v;
    try {
        return JSON.parse(v);
    } catch {
        return v;
    }
}, z.array(z.string().min(1), { invalid_type_error: 'Expected a JSON array of strings' }).optional());

export const envSchema = z.object({
    TARGET_ROLES: commaList,
    TARGET_LOCATIONS: commaList,
    SEARCH_PATTERNS: patternsJson,

    SEARCH_BACKEND: z.enum(['html', 'api']).default('html'),
    SEARCH_API_KEY: z.string().default(''),
    SEARCH_API_URL: z.string().url().default('https://serpapi.com/search.json'),
    HTML_SEARCH_URL: z.string().url().default('https://duckduckgo.com/html/'),
    USER_AGENT: z.string().min(1).default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'),
    PROXY_URL: z.string().default(''),

    QUERY_DELAY_MS: numFromEnv(2000),
    // A zero timeout aborts every request.
    REQUEST_TIMEOUT_MS: numFromEnv(10_000, z.number().finite().positive()),
    PAGE_TIMEOUT_MS: numFromEnv(8000, z.number().finite().positive()),
    ROLE_INFERENCE: z.enum(['pattern', 'page']).default('pattern'),

    LEDGER_PATH: z.string().min(1).default('latest_links.csv'),
    LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
