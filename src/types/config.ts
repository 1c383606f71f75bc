/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full explorer configuration merged from CLI flags, env vars, and config file.
 */
export interface ExplorerConfig {
    /** Directory where downloaded catalog database files are kept */
    dataDir: string;

    /** Number of records a reader fetches when no number is given */
    recordsPerPage: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // HTTP
    httpTimeout: number;
    contactEmail?: string;
}

/**
 * Default configuration values. `dataDir` is resolved against the home
 * directory at load time.
 */
export const DEFAULT_CONFIG: Omit<ExplorerConfig, 'dataDir'> = {
    recordsPerPage: 10,
    logLevel: 'info',
    jsonLogs: false,
    httpTimeout: 30000,
};
