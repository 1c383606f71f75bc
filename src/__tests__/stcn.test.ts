import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { DataFactory } from 'n3';
import { StcnReader } from '../catalogs/stcn.js';
import { EDPOPREC } from '../rdf/namespaces.js';
import { ReaderError } from '../readers/reader.js';
import { BibliographicalRecord } from '../records/bibliographical-record.js';
import { createHttpClient } from '../utils/http-client.js';

const { namedNode } = DataFactory;

const BOOK = 'http://data.bibliotheken.nl/id/nbt/p000000001';
const OTHER_BOOK = 'http://data.bibliotheken.nl/id/nbt/p000000002';

const SELECT_RESULT = {
    head: { vars: ['s', 'name'] },
    results: {
        bindings: [
            { s: { type: 'uri', value: BOOK }, name: { type: 'literal', value: 'Historie van Holland' } },
            { s: { type: 'uri', value: OTHER_BOOK } },
        ],
    },
};

const DESCRIPTION = `
@prefix schema: <http://schema.org/> .
<${BOOK}> schema:name "Historie van Holland, tweede druk" ;
    schema:alternateName "Hollandse historie", "Historie" ;
    schema:datePublished "1650" ;
    schema:inLanguage "nl" ;
    schema:numberOfPages "[8], 240 p." ;
    schema:bookFormat "4°" .
`;

function asBibliographical(record: unknown): BibliographicalRecord {
    if (!(record instanceof BibliographicalRecord)) {
        throw new Error('Expected a bibliographical record');
    }
    return record;
}

function queryOf(url: string): string {
    return new URL(url).searchParams.get('query') ?? '';
}

describe('StcnReader', () => {
    let mockFetch: Mock<(url: string) => Promise<Response>>;

    beforeEach(() => {
        mockFetch = vi.fn(async (url: string) => {
            if (queryOf(url).startsWith('CONSTRUCT')) {
                return new Response(DESCRIPTION, { headers: { 'content-type': 'text/turtle' } });
            }
            return new Response(JSON.stringify(SELECT_RESULT), {
                headers: { 'content-type': 'application/sparql-results+json' },
            });
        });
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    function reader(): StcnReader {
        const stcn = new StcnReader();
        stcn.setHttpClient(createHttpClient());
        return stcn;
    }

    it('should use the resource IRI as identifier', () => {
        expect(StcnReader.identifierToIri(BOOK)).toBe(BOOK);
        expect(StcnReader.iriToIdentifier(BOOK)).toBe(BOOK);
    });

    it('should search with a SELECT query', async () => {
        const stcn = reader();
        stcn.prepareQuery('holland "history"');
        await stcn.fetch();

        const query = queryOf(String(mockFetch.mock.calls[0]?.[0]));
        expect(query).toContain('SELECT ?s ?name WHERE {');
        expect(query).toContain('FILTER (regex(?o, "holland \\"history\\"", "i"))');
        expect(query).toContain('<http://data.bibliotheken.nl/id/dataset/stcn>');
    });

    it('should fetch all results at once as lazy records', async () => {
        const stcn = reader();
        stcn.prepareQuery('holland');
        const range = await stcn.fetch(1);

        expect(range.stop).toBe(2);
        expect(stcn.numberOfResults).toBe(2);
        expect(stcn.fetchingExhausted).toBe(true);
        expect(mockFetch).toHaveBeenCalledTimes(1);

        const record = await stcn.get(0, false);
        expect(record.fetched).toBe(false);
        expect(record.identifier).toBe(BOOK);
        expect(record.link).toBe(BOOK);
        expect(record.toString()).toBe('Historie van Holland');

        const unnamed = await stcn.get(1, false);
        expect(unnamed.toString()).toBe(`BibliographicalRecord object (${OTHER_BOOK})`);
    });

    it('should describe a record with a CONSTRUCT query when it is fetched', async () => {
        const record = asBibliographical(await StcnReader.getById(BOOK));
        expect(mockFetch).not.toHaveBeenCalled();

        await record.fetch();
        expect(record.fetched).toBe(true);
        expect(queryOf(String(mockFetch.mock.calls[0]?.[0]))).toBe(
            `CONSTRUCT { <${BOOK}> ?p ?o } WHERE { <${BOOK}> ?p ?o }`
        );

        expect(record.title?.originalText).toBe('Historie van Holland, tweede druk');
        expect(record.alternativeTitles?.map((title) => title.originalText).sort()).toEqual(['Historie', 'Hollandse historie']);
        expect(record.dating?.edtfDate).toBe('1650');
        expect(record.languages?.[0]?.languageCode).toBe('nld');
        expect(record.extent?.originalText).toBe('[8], 240 p.');
        expect(record.format?.originalText).toBe('4°');
        expect(record.data).toMatchObject({
            'http://schema.org/name': ['Historie van Holland, tweede druk'],
            'http://schema.org/datePublished': ['1650'],
            'http://schema.org/inLanguage': ['nl'],
        });
    });

    it('should serialize a lazy record after loading it', async () => {
        const record = await StcnReader.getById(BOOK);
        const graph = await record.toGraph();

        expect(graph.countQuads(namedNode(BOOK), EDPOPREC('title'), null, null)).toBe(1);
        expect(graph.countQuads(namedNode(BOOK), EDPOPREC('fromCatalog'), namedNode('https://edpop.hum.uu.nl/readers/stcn'), null)).toBe(1);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should reject an unexpected SELECT response', async () => {
        mockFetch.mockImplementation(async () => new Response('{"boolean":true}', {
            headers: { 'content-type': 'application/sparql-results+json' },
        }));
        const stcn = reader();
        stcn.prepareQuery('holland');

        await expect(stcn.fetch()).rejects.toThrow(ReaderError);
    });
});
