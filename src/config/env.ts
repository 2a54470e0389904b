import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Parses and validates the raw environment. Throws a ConfigError listing every
 * invalid variable; never exits the process itself.
 */
export function loadEnv(raw: NodeJS.ProcessEnv = process.env): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new ConfigError('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}

export type { Env };
