import { z } from 'zod';
import type { CatalogRecord } from '../records/record.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { getByIdBasedOnQuery, type QueryBasedLookup } from './get-by-id-based-on-query.js';
import { IndexRange } from './index-range.js';
import { Reader, ReaderError } from './reader.js';

/**
 * One result row of a CERL search, as returned by the API.
 */
export type CerlRow = Record<string, unknown>;

const searchResponseSchema = z.object({
    hits: z.object({ value: z.number().int().nonnegative() }).nullable(),
    rows: z.array(z.record(z.string(), z.unknown())).optional(),
});

/**
 * Reader for the CERL databases on the data.cerl.org platform, which share
 * one JSON search API.
 *
 * Subclasses set `apiUrl` (of the form `https://data.cerl.org/<catalog>/_search`)
 * and `linkBaseUrl`, and implement `convertRecord()`.
 */
export abstract class CerlReader extends Reader<string> implements QueryBasedLookup<string> {
    /** URL of the search API */
    protected abstract readonly apiUrl: string;
    /** Base URL of the human-readable pages of single records */
    protected abstract readonly linkBaseUrl: string;

    private httpClient: HttpClient = getHttpClient();

    protected abstract convertRecord(row: CerlRow): CatalogRecord;

    static async getById(this: new () => CerlReader, identifier: string): Promise<CatalogRecord> {
        return getByIdBasedOnQuery(this, identifier);
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    protected transformQuery(query: string): string {
        return query;
    }

    prepareGetByIdQuery(identifier: string): string {
        return identifier;
    }

    async fetchRange(range: IndexRange): Promise<IndexRange> {
        const query = this.requireQuery();
        const wanted = this.numberOfResults === null ? range : range.truncate(this.numberOfResults);
        if (wanted.isEmpty) {
            return new IndexRange(range.start, range.start);
        }

        const params = new URLSearchParams({
            query,
            from: String(wanted.start),
            size: String(wanted.length),
            mode: 'default',
            sort: 'default',
        });
        const url = `${this.apiUrl}?${params.toString()}`;
        getLogger().debug({ url }, 'CERL search');

        let data: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: 'cerl',
                headers: { Accept: 'application/json' },
            });
            data = response.data;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error during server request: ${message}`);
        }

        const parsed = searchResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new ReaderError('Number of hits not given in server response');
        }
        this.numberOfResults = parsed.data.hits?.value ?? 0;

        const rows = (parsed.data.rows ?? []).slice(0, wanted.length);
        rows.forEach((row, offset) => {
            this.records.set(wanted.start + offset, this.convertRecord(row));
        });
        return new IndexRange(wanted.start, wanted.start + rows.length);
    }

    /**
     * Identifier of a row: `id`, or `_id` for some databases.
     */
    protected rowIdentifier(row: CerlRow): string | null {
        for (const key of ['id', '_id']) {
            const value = row[key];
            if (typeof value === 'string' && value) return value;
        }
        return null;
    }
}
