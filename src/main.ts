#!/usr/bin/env node
/**
 * src/main.ts
 *
 * Entry point: one discovery run.
 *
 *   greenhouse-scout                          search with configured targets
 *   greenhouse-scout --roles "data analyst"   override target roles
 *   greenhouse-scout --url <board page>       direct-scrape a single page
 *
 * Exit code 1 only for configuration errors and a failed ledger write;
 * individual search failures are logged and absorbed.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { log } from 'crawlee';
import { ConfigError, loadEnv } from './config/env.js';
import { applyFlagsToEnv, buildRunOptions, type CliFlags } from './config/runOptions.js';
import { LedgerWriteError } from './ledger/csvLedger.js';
import { runDiscovery } from './orchestrator.js';

function applyLogLevel(level: string, verbose: boolean): void {
    const levels: Record<string, number> = {
        DEBUG: log.LEVELS.DEBUG,
        INFO: log.LEVELS.INFO,
        WARNING: log.LEVELS.WARNING,
        ERROR: log.LEVELS.ERROR,
        OFF: log.LEVELS.OFF,
    };
    const name = verbose ? 'DEBUG' : level.trim().toUpperCase();
    log.setLevel(levels[name] ?? log.LEVELS.INFO);
}

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('greenhouse-scout')
        .description('Discover Greenhouse job postings and append new ones to a CSV ledger')
        .option('--roles <list>', 'Comma-separated target roles')
        .option('--locations <list>', 'Comma-separated target locations')
        .option('--url <target>', 'Scrape posting links from this page instead of searching')
        .option('--backend <kind>', 'Search backend: html or api')
        .option('--ledger <path>', 'CSV ledger file')
        .option('-v, --verbose', 'Debug logging', false)
        .parse(process.argv);

    const flags = program.opts<CliFlags>();

    try {
        const env = loadEnv(applyFlagsToEnv(process.env, flags));
        applyLogLevel(env.LOG_LEVEL, flags.verbose ?? false);
        await runDiscovery(buildRunOptions(env, flags));
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(err.message);
            process.exitCode = 1;
            return;
        }
        if (err instanceof LedgerWriteError) {
            log.error(`[Run] ✗ ${err.message}`);
            process.exitCode = 1;
            return;
        }
        throw err;
    }
}

main().catch((err: unknown) => {
    log.exception(err instanceof Error ? err : new Error(String(err)), '[Run] Unexpected failure');
    process.exitCode = 1;
});
