#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { FieldError } from '../fields/field.js';
import { ReaderError } from '../readers/reader.js';
import { RecordError } from '../records/record.js';
import type { ExplorerConfig, LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { getHttpClient } from '../utils/http-client.js';
import { getLogger, initLogger } from '../utils/logger.js';
import { describeCatalog, listCatalogs, searchCatalog, showRecord } from './commands.js';

const VERSION = '0.1.0';

type GlobalOptions = {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    dataDir?: string;
};

interface SearchCommandOptions {
    number?: number;
    start?: number;
}

let config: ExplorerConfig | null = null;

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') {
        return value;
    }
    throw new InvalidArgumentError('Should be one of debug, info, warn, error.');
}

/**
 * Run a command, reporting errors of readers, records and fields without
 * a stack trace.
 */
async function run(action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (error) {
        if (error instanceof ReaderError || error instanceof RecordError || error instanceof FieldError) {
            getLogger().error(`${error.name}: ${error.message}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}

const program = new Command();

program
    .name('catalog-explorer')
    .description('Search bibliographical and biographical catalogs and express their records as linked data.')
    .version(VERSION)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .option('--data-dir <dir>', 'Directory for downloaded catalog databases')
    .hook('preAction', async () => {
        const opts = program.opts<GlobalOptions>();
        const cliConfig: Partial<ExplorerConfig> = {};
        if (opts.logLevel) cliConfig.logLevel = opts.logLevel;
        if (opts.jsonLogs) cliConfig.jsonLogs = true;
        if (opts.dataDir) cliConfig.dataDir = opts.dataDir;

        config = await resolveConfig(cliConfig);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getHttpClient({ timeout: config.httpTimeout, version: VERSION, email: config.contactEmail });
    });

// ─── CATALOGS command ─────────────────────────────────────

program
    .command('catalogs')
    .description('List the available catalogs')
    .action(() => {
        for (const line of listCatalogs()) {
            console.log(line);
        }
    });

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search a catalog')
    .argument('<catalog>', 'Catalog slug, see the catalogs command')
    .argument('<query>', 'Search query')
    .option('-n, --number <n>', 'Number of records to fetch', parseCount)
    .option('-s, --start <n>', 'Number of results to skip', parseCount)
    .action((catalog: string, query: string, opts: SearchCommandOptions) =>
        run(async () => {
            const number = opts.number ?? config?.recordsPerPage ?? 10;
            const result = await searchCatalog(catalog, query, { number, start: opts.start });
            console.log(`${result.numberOfResults} results`);
            for (const line of result.lines) {
                console.log(line);
            }
        })
    );

// ─── SHOW command ─────────────────────────────────────────

program
    .command('show')
    .description('Show one record as Turtle')
    .argument('<catalog>', 'Catalog slug')
    .argument('<identifier>', 'Record identifier')
    .action((catalog: string, identifier: string) =>
        run(async () => {
            console.log(await showRecord(catalog, identifier));
        })
    );

// ─── CATALOG command ──────────────────────────────────────

program
    .command('catalog')
    .description('Show the description of a catalog as Turtle')
    .argument('<catalog>', 'Catalog slug')
    .action((catalog: string) =>
        run(async () => {
            console.log(await describeCatalog(catalog));
        })
    );

await program.parseAsync(process.argv);
