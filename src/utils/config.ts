import { homedir } from 'node:os';
import { join } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ExplorerConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'catalogExplorer';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Shape of `catalog-explorer.config.json`. Every key is optional; unknown
 * keys are rejected so that typos do not pass silently.
 */
const fileConfigSchema = z
    .object({
        dataDir: z.string().min(1),
        recordsPerPage: z.number().int().positive(),
        logLevel: logLevelSchema,
        jsonLogs: z.boolean(),
        httpTimeout: z.number().int().positive(),
        contactEmail: z.string().email(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

let configInstance: ExplorerConfig | null = null;

/**
 * Default location of downloaded catalog databases.
 */
export function defaultDataDir(): string {
    return join(homedir(), '.catalog-explorer', 'data');
}

/**
 * Load configuration from catalog-explorer.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used then).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: ['catalog-explorer.config.json', 'package.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): Partial<ExplorerConfig> {
    const env: Partial<ExplorerConfig> = {};

    const dataDir = process.env['CATALOG_EXPLORER_DATA_DIR'];
    if (dataDir) {
        env.dataDir = dataDir;
    }

    const level = logLevelSchema.safeParse(process.env['CATALOG_EXPLORER_LOG_LEVEL']);
    if (level.success) {
        env.logLevel = level.data;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults.
 * CLI flags must only carry keys the user actually set.
 */
export async function resolveConfig(
    cliFlags: Partial<ExplorerConfig>,
    searchFrom?: string
): Promise<ExplorerConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    const merged: ExplorerConfig = {
        ...DEFAULT_CONFIG,
        dataDir: defaultDataDir(),
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };

    configInstance = merged;
    return merged;
}

/**
 * Get the active configuration. Falls back to the defaults when
 * `resolveConfig()` has not run (library use, tests).
 */
export function getConfig(): ExplorerConfig {
    if (!configInstance) {
        configInstance = { ...DEFAULT_CONFIG, dataDir: defaultDataDir() };
    }
    return configInstance;
}

/**
 * Replace the active configuration (for embedding and tests).
 */
export function setConfig(config: ExplorerConfig): void {
    configInstance = config;
}
