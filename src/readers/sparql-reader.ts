import { Parser, Store } from 'n3';
import { z } from 'zod';
import type { Graph } from '../rdf/namespaces.js';
import type { CatalogRecord } from '../records/record.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { IndexRange } from './index-range.js';
import { Reader, ReaderError } from './reader.js';

const bindingSchema = z.object({
    type: z.string(),
    value: z.string(),
});

const selectResultSchema = z.object({
    results: z.object({
        bindings: z.array(
            z.object({
                s: bindingSchema,
                name: bindingSchema.optional(),
            })
        ),
    }),
});

/**
 * Escape a value for use inside a double-quoted SPARQL string literal.
 */
export function escapeSparqlString(value: string): string {
    return value.replace(/[\\"]/g, (c) => `\\${c}`).replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

/**
 * Reader for linked-data catalogs with a SPARQL endpoint.
 *
 * A search runs one SELECT query that returns the subject IRI and name of
 * every matching resource and fetches all results at once. The records
 * are lazy: their description is retrieved with a CONSTRUCT query when
 * they are first fetched and handed to `populateRecord()`.
 *
 * The IRI of a resource serves as record identifier, so identifiers and
 * IRIs map onto themselves.
 */
export abstract class SparqlReader<R extends CatalogRecord = CatalogRecord> extends Reader<string> {
    static override FETCH_ALL_AT_ONCE = true;

    /** URL of the SPARQL endpoint */
    protected abstract readonly endpoint: string;
    /** Graph pattern restricting `?s` to the resources of this catalog */
    protected abstract readonly filter: string;

    private httpClient: HttpClient = getHttpClient();

    /**
     * Create an empty record, with the name from the search results if
     * available.
     */
    protected abstract createRecord(name: string | null): R;

    /**
     * Fill in the fields of a record from the triples describing it.
     */
    protected abstract populateRecord(record: R, graph: Graph): void;

    static async getById<T extends CatalogRecord>(
        this: new () => SparqlReader<T>,
        identifier: string
    ): Promise<T> {
        return new this().lazyRecord(identifier, null);
    }

    static override identifierToIri(identifier: string): string {
        return identifier;
    }

    static override iriToIdentifier(iri: string): string {
        return iri;
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    protected transformQuery(query: string): string {
        return [
            'PREFIX schema: <http://schema.org/>',
            'SELECT ?s ?name WHERE {',
            '  ?s ?p ?o .',
            '  ?s schema:name ?name .',
            `  ${this.filter}`,
            `  FILTER (regex(?o, "${escapeSparqlString(query)}", "i"))`,
            '}',
            'ORDER BY ?s',
        ].join('\n');
    }

    async fetchRange(range: IndexRange): Promise<IndexRange> {
        const query = this.requireQuery();
        if (this.fetchingStarted) {
            // Everything was fetched by the first request
            return new IndexRange(range.start, range.start);
        }

        const data = await this.runQuery(query, 'application/sparql-results+json');
        const parsed = selectResultSchema.safeParse(data);
        if (!parsed.success) {
            throw new ReaderError('Unexpected response from SPARQL endpoint');
        }

        const bindings = parsed.data.results.bindings;
        bindings.forEach((binding, index) => {
            this.records.set(index, this.lazyRecord(binding.s.value, binding.name?.value ?? null));
        });
        this.numberOfResults = bindings.length;
        return new IndexRange(0, bindings.length);
    }

    /**
     * A lazy record for the resource with IRI `iri`.
     */
    lazyRecord(iri: string, name: string | null): R {
        const record = this.createRecord(name);
        record.identifier = iri;
        record.link = iri;
        record.setLoader((loaded) => this.loadRecord(loaded));
        return record;
    }

    private async loadRecord(record: R): Promise<void> {
        const iri = record.identifier;
        if (!iri) {
            throw new ReaderError('Record has no IRI to dereference');
        }
        const construct = `CONSTRUCT { <${iri}> ?p ?o } WHERE { <${iri}> ?p ?o }`;
        const turtle = await this.runQuery(construct, 'text/turtle');
        if (typeof turtle !== 'string') {
            throw new ReaderError('SPARQL endpoint did not return Turtle');
        }
        const graph = new Store(new Parser({ format: 'text/turtle' }).parse(turtle));
        record.data = describe(graph, iri);
        this.populateRecord(record, graph);
    }

    private async runQuery(query: string, accept: string): Promise<unknown> {
        const url = `${this.endpoint}?${new URLSearchParams({ query }).toString()}`;
        getLogger().debug({ endpoint: this.endpoint }, 'SPARQL query');
        try {
            const response = await this.httpClient.get(url, {
                source: 'sparql',
                headers: { Accept: accept },
            });
            return response.data;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error during server request: ${message}`);
        }
    }
}

/**
 * Predicate IRIs of `subject` mapped to the values of their objects.
 */
function describe(graph: Graph, subject: string): Record<string, string[]> {
    const description: Record<string, string[]> = {};
    for (const triple of graph.getQuads(subject, null, null, null)) {
        const values = description[triple.predicate.value] ?? [];
        values.push(triple.object.value);
        description[triple.predicate.value] = values;
    }
    return description;
}
