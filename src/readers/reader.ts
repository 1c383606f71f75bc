import { DataFactory, Store, type Quad } from 'n3';
import stringify from 'json-stable-stringify';
import type { CatalogRecord } from '../records/record.js';
import { EDPOPREC, RDF, SDO, type Graph } from '../rdf/namespaces.js';
import { ReaderType, type PreparedQuery } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { IndexRange } from './index-range.js';

const { namedNode, literal, quad } = DataFactory;

// ─── Errors ───────────────────────────────────────────────

/**
 * Generic error of a reader: misuse of the query state, adapter
 * misconfiguration or a failing catalog server. More specific errors
 * derive from this class.
 */
export class ReaderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReaderError';
    }
}

/**
 * The requested record does not exist or is not available.
 */
export class NotFoundError extends ReaderError {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

// ─── Reader classes ───────────────────────────────────────

/**
 * The static side of a concrete reader. Every reader class in the registry
 * has to satisfy this, which makes `getById` mandatory.
 */
export interface ReaderClass<R extends Reader = Reader> {
    new (): R;
    readonly name: string;
    readonly READERTYPE: ReaderType | null;
    readonly CATALOG_URIREF: string | null;
    readonly IRI_PREFIX: string | null;
    readonly SHORT_NAME: string | null;
    readonly DESCRIPTION: string | null;
    readonly FETCH_ALL_AT_ONCE: boolean;
    readonly DEFAULT_RECORDS_PER_PAGE: number;
    getById(identifier: string): Promise<CatalogRecord>;
    getByIri(iri: string): Promise<CatalogRecord>;
    identifierToIri(identifier: string): string;
    iriToIdentifier(iri: string): string;
    catalogToGraph(): Graph;
    getCatalogSlug(): string | null;
}

/**
 * Percent-encode an identifier for use after an IRI prefix. Slashes stay
 * literal and only letters, digits and `-._~` are left unescaped otherwise.
 */
function quoteIdentifier(identifier: string): string {
    return encodeURIComponent(identifier)
        .replace(/%2F/g, '/')
        .replace(/[!'()*]/g, (c) => '%' + c.charCodeAt(0).toString(16).toUpperCase());
}

function isReaderConstructor(value: unknown): value is typeof Reader {
    return typeof value === 'function' && (value === Reader || value.prototype instanceof Reader);
}

/**
 * Base reader class.
 *
 * To use, instantiate a subclass, set a query with `prepareQuery()` or
 * `setQuery()` and call `fetch()` until you have the number of results
 * you need. `numberOfResults`, `numberFetched` and `records` are updated
 * after every fetch.
 *
 * To create a concrete reader, implement `transformQuery()` and
 * `fetchRange()`, set the static metadata and provide a static
 * `getById()`. `fetchRange()` fills `records` and sets
 * `numberOfResults` as soon as it is known; it may be called with a range
 * that extends past the end of the results and then populates only the
 * records that exist.
 */
export abstract class Reader<Q extends PreparedQuery = PreparedQuery> {
    /** Whether the catalog is bibliographical or biographical */
    static READERTYPE: ReaderType | null = null;
    /** IRI of the catalog itself */
    static CATALOG_URIREF: string | null = null;
    /**
     * Prefix to create an IRI out of a record identifier. Readers for
     * which a prefix is not enough override `identifierToIri()` and
     * `iriToIdentifier()`.
     */
    static IRI_PREFIX: string | null = null;
    /** Short name of the catalog, for user interfaces */
    static SHORT_NAME: string | null = null;
    /** Information about the contents of the catalog, for user interfaces */
    static DESCRIPTION: string | null = null;
    /** True if the reader always fetches all results at once */
    static FETCH_ALL_AT_ONCE = false;
    /** Number of records `fetch()` asks for if not told otherwise */
    static DEFAULT_RECORDS_PER_PAGE = 10;

    /** Fetched records by index. May have gaps. */
    readonly records = new Map<number, CatalogRecord>();

    /** Total number of results, or null until the first fetch */
    numberOfResults: number | null = null;

    preparedQuery: Q | null = null;

    private fetchPosition = 0;
    private queue: Promise<void> = Promise.resolve();

    /**
     * Translate a user query into the form the catalog's API takes.
     */
    protected abstract transformQuery(query: string): Q;

    /**
     * Fetch a specific range of records. Only the records that exist are
     * populated.
     *
     * @returns The range of indexes that has actually been populated
     */
    abstract fetchRange(range: IndexRange): Promise<IndexRange>;

    // ─── Query state ──────────────────────────────────────────

    get numberFetched(): number {
        return this.records.size;
    }

    /** As soon as fetching has started, the query cannot be changed */
    get fetchingStarted(): boolean {
        return this.numberOfResults !== null;
    }

    /**
     * True once every result has been fetched, or the cursor has reached
     * the end of the results after skipping some with `adjustStartRecord()`.
     */
    get fetchingExhausted(): boolean {
        if (this.numberOfResults === null) return false;
        return this.numberFetched === this.numberOfResults || this.fetchPosition >= this.numberOfResults;
    }

    prepareQuery(query: string): void {
        this.assertNotStarted('change the query');
        this.preparedQuery = this.transformQuery(query);
    }

    /**
     * Set an exact prepared query, bypassing `transformQuery()`.
     */
    setQuery(query: Q): void {
        this.assertNotStarted('change the query');
        this.preparedQuery = query;
    }

    /**
     * Skip the first `start` results: the next `fetch()` starts there.
     * Used to resume a session of which the first results are already
     * known.
     */
    adjustStartRecord(start: number): void {
        this.assertNotStarted('adjust the start record');
        if (!Number.isInteger(start) || start < 0) {
            throw new ReaderError(`Start record should be a non-negative integer, got ${start}`);
        }
        this.fetchPosition = start;
    }

    // ─── Fetching ─────────────────────────────────────────────

    /**
     * Fetch the next `count` records (the reader's default page size if
     * omitted) after the ones fetched before. Readers that fetch all
     * records at once ignore `count`.
     *
     * @returns The range of indexes that has been populated, which is empty
     * once all results have been fetched
     */
    async fetch(count?: number): Promise<IndexRange> {
        return this.exclusive(async () => {
            if (this.fetchingExhausted) {
                return IndexRange.empty();
            }
            this.requireQuery();
            const size = count ?? this.readerClass().DEFAULT_RECORDS_PER_PAGE;
            if (!Number.isInteger(size) || size < 0) {
                throw new ReaderError(`Number of records to fetch should be a non-negative integer, got ${size}`);
            }
            const requested = new IndexRange(this.fetchPosition, this.fetchPosition + size);
            getLogger().debug({ reader: this.constructor.name, range: requested.toString() }, 'Fetching records');

            const fetched = await this.fetchRange(requested);
            if (!fetched.isEmpty) {
                this.fetchPosition = fetched.stop;
            }
            return fetched;
        });
    }

    /**
     * Get the record with the given index, fetching it if it is not
     * available yet and `allowFetching` is set.
     */
    async get(index: number, allowFetching = true): Promise<CatalogRecord> {
        const available = this.records.get(index);
        if (available) {
            return available;
        }
        const mayExist = index >= 0 && (this.numberOfResults === null || index < this.numberOfResults);
        if (allowFetching && mayExist) {
            await this.exclusive(() => this.fetchRange(new IndexRange(index, index + 1)));
            const fetched = this.records.get(index);
            if (fetched) {
                return fetched;
            }
        }
        throw new NotFoundError(`Item with index ${index} is not available.`);
    }

    /**
     * A stable identifier of the combination of reader type and prepared
     * query, to recognise a search session across restarts.
     */
    generateIdentifier(): string {
        const query = this.requireQuery();
        const canonical = typeof query === 'string' ? query : stringify(query) ?? '';
        return `${this.constructor.name} | ${canonical}`;
    }

    // ─── Helpers for subclasses ───────────────────────────────

    /**
     * The prepared query, or a ReaderError if there is none yet.
     */
    protected requireQuery(): Q {
        if (this.preparedQuery === null) {
            throw new ReaderError('First call prepareQuery() or setQuery()');
        }
        return this.preparedQuery;
    }

    /**
     * The concrete class of this reader, for access to its static
     * metadata from instance code.
     */
    protected readerClass(): typeof Reader {
        const ctor: unknown = this.constructor;
        if (!isReaderConstructor(ctor)) {
            throw new ReaderError(`${this.constructor.name} is not a reader class`);
        }
        return ctor;
    }

    private assertNotStarted(action: string): void {
        if (this.fetchingStarted) {
            throw new ReaderError(`Cannot ${action} after fetching has started`);
        }
    }

    /**
     * Run one request at a time per reader, in call order.
     */
    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const result = this.queue.then(task);
        this.queue = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    // ─── Static API ───────────────────────────────────────────

    /**
     * Get a single record by its IRI.
     */
    static async getByIri(
        this: Pick<ReaderClass, 'getById' | 'iriToIdentifier'>,
        iri: string
    ): Promise<CatalogRecord> {
        return this.getById(this.iriToIdentifier(iri));
    }

    static identifierToIri(identifier: string): string {
        if (this.IRI_PREFIX === null) {
            throw new ReaderError(`Cannot convert identifier to IRI: ${this.name}.IRI_PREFIX is not set`);
        }
        return this.IRI_PREFIX + quoteIdentifier(identifier);
    }

    static iriToIdentifier(iri: string): string {
        if (this.IRI_PREFIX === null) {
            throw new ReaderError(`Cannot convert IRI to identifier: ${this.name}.IRI_PREFIX is not set`);
        }
        if (!iri.startsWith(this.IRI_PREFIX)) {
            throw new ReaderError(`Cannot convert IRI ${iri} to identifier: IRI does not start with ${this.IRI_PREFIX}`);
        }
        try {
            return decodeURIComponent(iri.slice(this.IRI_PREFIX.length));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Cannot convert IRI ${iri} to identifier: ${message}`);
        }
    }

    /**
     * RDF description of the catalog this reader gives access to, as an
     * instance of edpoprec:Catalog.
     */
    static catalogToGraph(): Graph {
        if (!this.CATALOG_URIREF) {
            throw new ReaderError(
                `Cannot create graph because ${this.name}.CATALOG_URIREF has not been set`
            );
        }
        const catalog = namedNode(this.CATALOG_URIREF);

        let rdfClass = EDPOPREC('Catalog');
        if (this.READERTYPE === ReaderType.BIOGRAPHICAL) {
            rdfClass = EDPOPREC('BiographicalCatalog');
        } else if (this.READERTYPE === ReaderType.BIBLIOGRAPHICAL) {
            rdfClass = EDPOPREC('BibliographicalCatalog');
        }

        const quads: Quad[] = [quad(catalog, RDF('type'), rdfClass)];
        if (this.SHORT_NAME) {
            quads.push(quad(catalog, SDO('name'), literal(this.SHORT_NAME)));
        }
        if (this.DESCRIPTION) {
            quads.push(quad(catalog, SDO('description'), literal(this.DESCRIPTION)));
        }
        const slug = this.getCatalogSlug();
        if (slug !== null) {
            quads.push(quad(catalog, SDO('identifier'), literal(slug)));
        }
        return new Store(quads);
    }

    /**
     * Last path segment of the catalog IRI, used to select the catalog on
     * the command line.
     */
    static getCatalogSlug(): string | null {
        if (!this.CATALOG_URIREF) return null;
        return this.CATALOG_URIREF.split('/').pop() ?? null;
    }
}
