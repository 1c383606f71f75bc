import { parseStringPromise, processors } from 'xml2js';
import { z } from 'zod';
import type { CatalogRecord } from '../records/record.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { getByIdBasedOnQuery, type QueryBasedLookup } from './get-by-id-based-on-query.js';
import { IndexRange } from './index-range.js';
import { Reader, ReaderError } from './reader.js';

/**
 * Contents of the `recordData` element of one SRU record, parsed by xml2js
 * with namespace prefixes stripped and attributes ignored. Repeated
 * elements become arrays, elements with only text become strings.
 */
export type SruRecordData = Record<string, unknown>;

const diagnosticSchema = z.object({
    uri: z.string().optional(),
    details: z.string().optional(),
    message: z.string().optional(),
});

const recordSchema = z.object({
    recordData: z.record(z.string(), z.unknown()),
});

const searchRetrieveSchema = z.object({
    searchRetrieveResponse: z.object({
        numberOfRecords: z.coerce.number().int().nonnegative().optional(),
        records: z
            .union([
                z.object({ record: z.union([recordSchema, z.array(recordSchema)]).optional() }),
                z.literal(''),
            ])
            .optional(),
        diagnostics: z
            .object({ diagnostic: z.union([diagnosticSchema, z.array(diagnosticSchema)]) })
            .optional(),
    }),
});

type SearchRetrieveResponse = z.infer<typeof searchRetrieveSchema>['searchRetrieveResponse'];

function toArray<T>(value: T | T[] | undefined): T[] {
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Reader for catalogs with an SRU (Search/Retrieve via URL) interface.
 *
 * Subclasses set `sruUrl` and `sruVersion`, translate the user query into
 * CQL in `transformQuery()` and map the contents of each record to a
 * `CatalogRecord` in `convertRecord()`. Single records are retrieved by
 * searching for their identifier; override `prepareGetByIdQuery()` if the
 * catalog has a better query for that.
 */
export abstract class SruReader extends Reader<string> implements QueryBasedLookup<string> {
    /** URL of the SRU API */
    protected abstract readonly sruUrl: string;
    /** Version of the SRU protocol */
    protected abstract readonly sruVersion: '1.1' | '1.2' | '2.0';
    /** Requested record schema; the server's default if null */
    protected readonly sruSchema: string | null = null;
    /** Extra URL parameters some servers require */
    protected readonly additionalParams: Record<string, string> = {};

    private httpClient: HttpClient = getHttpClient();

    /**
     * Convert the parsed `recordData` of one SRU record into a record.
     */
    protected abstract convertRecord(recordData: SruRecordData): CatalogRecord;

    static async getById(this: new () => SruReader, identifier: string): Promise<CatalogRecord> {
        return getByIdBasedOnQuery(this, identifier);
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    prepareGetByIdQuery(identifier: string): string {
        return this.transformQuery(identifier);
    }

    async fetchRange(range: IndexRange): Promise<IndexRange> {
        const query = this.requireQuery();
        const wanted = this.numberOfResults === null ? range : range.truncate(this.numberOfResults);
        if (wanted.isEmpty) {
            return new IndexRange(range.start, range.start);
        }

        const response = await this.searchRetrieve(query, wanted);
        this.numberOfResults = response.numberOfRecords ?? 0;

        const rawRecords = response.records === '' || response.records === undefined
            ? []
            : toArray(response.records.record).slice(0, wanted.length);
        rawRecords.forEach((raw, offset) => {
            this.records.set(wanted.start + offset, this.convertRecord(raw.recordData));
        });
        return new IndexRange(wanted.start, wanted.start + rawRecords.length);
    }

    /**
     * URL of the searchRetrieve request for `range` (SRU counts from 1).
     */
    protected buildUrl(query: string, range: IndexRange): string {
        const params = new URLSearchParams({
            operation: 'searchRetrieve',
            version: this.sruVersion,
            query,
            startRecord: String(range.start + 1),
            maximumRecords: String(range.length),
        });
        if (this.sruSchema) {
            params.set('recordSchema', this.sruSchema);
        }
        for (const [key, value] of Object.entries(this.additionalParams)) {
            params.set(key, value);
        }
        return `${this.sruUrl}?${params.toString()}`;
    }

    private async searchRetrieve(query: string, range: IndexRange): Promise<SearchRetrieveResponse> {
        const url = this.buildUrl(query, range);
        getLogger().debug({ url }, 'SRU searchRetrieve');

        let body: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: 'sru',
                headers: { Accept: 'application/xml, text/xml' },
            });
            body = response.data;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error during server request: ${message}`);
        }
        if (typeof body !== 'string') {
            throw new ReaderError('Server did not return an XML document');
        }

        let parsed: unknown;
        try {
            parsed = await parseStringPromise(body, {
                explicitArray: false,
                ignoreAttrs: true,
                trim: true,
                tagNameProcessors: [processors.stripPrefix],
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Could not parse server response: ${message}`);
        }

        const result = searchRetrieveSchema.safeParse(parsed);
        if (!result.success) {
            throw new ReaderError(`Unexpected SRU response: ${result.error.issues[0]?.message ?? 'invalid structure'}`);
        }
        const response = result.data.searchRetrieveResponse;

        const diagnostics = toArray(response.diagnostics?.diagnostic);
        if (diagnostics.length > 0) {
            const messages = diagnostics.map((diagnostic) =>
                [diagnostic.message, diagnostic.details].filter(Boolean).join(': ') || (diagnostic.uri ?? 'unknown error')
            );
            throw new ReaderError(`Server returned error: ${messages.join('; ')}`);
        }
        return response;
    }
}
