import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { getConfig } from '../utils/config.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ReaderError } from './reader.js';

export interface DatabaseFileOptions {
    /** Name of the reader using the file, for messages */
    readonly readerName: string;
    /** Filename (not the full path) of the database in the data directory */
    readonly filename: string;
    /** Where to download the file from. Without it, the user has to obtain the file. */
    readonly url?: string | null;
    /** URL of the license of the downloaded file */
    readonly license?: string | null;
}

/**
 * A database file in the configured data directory, downloaded on first
 * use if a download URL is known.
 */
export class DatabaseFile {
    private httpClient: HttpClient;

    constructor(private readonly options: DatabaseFileOptions) {
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    get path(): string {
        return join(getConfig().dataDir, this.options.filename);
    }

    /**
     * Make sure the database file is available and return its path.
     */
    async prepare(): Promise<string> {
        const path = this.path;
        if (existsSync(path)) {
            return path;
        }
        const { url, readerName, filename } = this.options;
        if (!url) {
            throw new ReaderError(
                `${readerName} database not found. Please obtain the file ${filename} ` +
                `and add it to the following directory: ${resolve(dirname(path))}`
            );
        }
        await this.download(url, path);
        return path;
    }

    private async download(url: string, path: string): Promise<void> {
        getLogger().info({ url }, 'Downloading database');
        let content: Buffer;
        try {
            content = await this.httpClient.download(url);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error downloading database file from ${url}: ${message}`);
        }
        try {
            await mkdir(dirname(path), { recursive: true });
            await writeFile(path, content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error writing database file to disk: ${message}`);
        }
        getLogger().info({ path, license: this.options.license ?? undefined }, 'Saved database');
    }
}
