import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import { ContributorField } from '../fields/contributor-field.js';
import { Field, FieldError, type Subfield } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import { EDPOPREC, RDF } from '../rdf/namespaces.js';
import { BibliographicalRecord } from '../records/bibliographical-record.js';
import { BiographicalRecord } from '../records/biographical-record.js';
import { CatalogRecord, RawData, RecordError, type FieldRegistryEntry } from '../records/record.js';
import { ReaderType, type CatalogDescriptor } from '../types/index.js';

const { namedNode, literal } = DataFactory;

const bibliographicalReader: CatalogDescriptor = {
    name: 'TestReader',
    READERTYPE: ReaderType.BIBLIOGRAPHICAL,
    CATALOG_URIREF: 'http://example.com/catalog',
    identifierToIri: (identifier) => `http://example.com/records/${identifier}`,
};

const untypedReader: CatalogDescriptor = {
    name: 'UntypedReader',
    READERTYPE: null,
    CATALOG_URIREF: null,
    identifierToIri: (identifier) => `http://example.com/untyped/${identifier}`,
};

class MisdeclaredRecord extends CatalogRecord {
    language: Field | null = null;

    protected override fields(): FieldRegistryEntry[] {
        return [
            { name: 'language', predicate: EDPOPREC('language'), fieldType: LanguageField, value: () => this.language },
        ];
    }
}

class NonFieldTypeRecord extends CatalogRecord {
    title: Field | null = null;

    protected override fields(): FieldRegistryEntry[] {
        return [
            { name: 'title', predicate: EDPOPREC('title'), fieldType: Date, value: () => this.title },
        ];
    }
}

class CountField extends Field {
    count: number | null = 3;

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'count', predicate: EDPOPREC('count'), datatype: 'string', value: () => this.count },
        ];
    }
}

class TitleData extends RawData {
    constructor(private readonly title: string) {
        super();
    }

    toDict(): Record<string, unknown> {
        return { title: this.title };
    }
}

function bibliographicalRecord(identifier: string | null = '1'): BibliographicalRecord {
    const record = new BibliographicalRecord(bibliographicalReader);
    record.identifier = identifier;
    return record;
}

describe('CatalogRecord', () => {
    describe('subject node', () => {
        it('should be the record IRI if there is an identifier', () => {
            const record = bibliographicalRecord();
            expect(record.iri).toBe('http://example.com/records/1');
            expect(record.subjectNode.equals(namedNode('http://example.com/records/1'))).toBe(true);
        });

        it('should return the same node on every access', () => {
            const record = bibliographicalRecord();
            expect(record.subjectNode).toBe(record.subjectNode);

            const anonymous = bibliographicalRecord(null);
            expect(anonymous.subjectNode.termType).toBe('BlankNode');
            expect(anonymous.subjectNode).toBe(anonymous.subjectNode);
        });

        it('should follow a change of identifier', () => {
            const record = bibliographicalRecord();
            const before = record.subjectNode;
            record.identifier = '2';
            expect(record.subjectNode).not.toBe(before);
            expect(record.subjectNode.value).toBe('http://example.com/records/2');
        });

        it('should give different records different blank nodes', () => {
            expect(bibliographicalRecord(null).subjectNode.equals(bibliographicalRecord(null).subjectNode)).toBe(false);
        });
    });

    describe('toGraph', () => {
        it('should describe the record itself', async () => {
            const record = bibliographicalRecord();
            record.link = 'http://example.com/show/1';
            const graph = await record.toGraph();
            const subject = record.subjectNode;

            expect(graph.countQuads(subject, RDF('type'), EDPOPREC('BibliographicalRecord'), null)).toBe(1);
            expect(graph.countQuads(subject, EDPOPREC('fromCatalog'), namedNode('http://example.com/catalog'), null)).toBe(1);
            expect(graph.countQuads(subject, EDPOPREC('identifier'), literal('1'), null)).toBe(1);
            expect(graph.countQuads(subject, EDPOPREC('publicURL'), literal('http://example.com/show/1'), null)).toBe(1);
            expect(graph.size).toBe(4);
        });

        it('should use the generic class for readers without type', async () => {
            const record = new CatalogRecord(untypedReader);
            record.identifier = 'x';
            const graph = await record.toGraph();

            expect(graph.countQuads(record.subjectNode, RDF('type'), EDPOPREC('Record'), null)).toBe(1);
            expect(graph.countQuads(record.subjectNode, EDPOPREC('fromCatalog'), null, null)).toBe(0);
        });

        it('should use the biographical class for biographical readers', async () => {
            const record = new BiographicalRecord({ ...bibliographicalReader, READERTYPE: ReaderType.BIOGRAPHICAL });
            const graph = await record.toGraph();
            expect(graph.countQuads(record.subjectNode, RDF('type'), EDPOPREC('BiographicalRecord'), null)).toBe(1);
        });

        it('should store original data as a JSON literal', async () => {
            const record = bibliographicalRecord();
            record.data = { title: 'Een boek', pages: 12 };
            const graph = await record.toGraph();

            const expected = literal('{"title":"Een boek","pages":12}', RDF('JSON'));
            expect(graph.countQuads(record.subjectNode, EDPOPREC('originalData'), expected, null)).toBe(1);
        });

        it('should render raw data through toDict', async () => {
            const record = bibliographicalRecord();
            record.data = new TitleData('Een boek');
            const graph = await record.toGraph();

            const expected = literal('{"title":"Een boek"}', RDF('JSON'));
            expect(graph.countQuads(record.subjectNode, EDPOPREC('originalData'), expected, null)).toBe(1);
            await expect(record.getDataDict()).resolves.toEqual({ title: 'Een boek' });
        });

        it('should link a single field and include its graph', async () => {
            const record = bibliographicalRecord();
            record.title = new Field('Een boek');
            const graph = await record.toGraph();

            const links = graph.getQuads(record.subjectNode, EDPOPREC('title'), null, null);
            expect(links).toHaveLength(1);
            const fieldNode = links[0]?.object;
            expect(fieldNode?.termType).toBe('NamedNode');
            expect(fieldNode?.value.startsWith('http://example.com/records/1#title-')).toBe(true);
            expect(graph.countQuads(fieldNode ?? null, EDPOPREC('originalText'), literal('Een boek'), null)).toBe(1);
        });

        it('should link every field of a list', async () => {
            const record = bibliographicalRecord();
            record.contributors = [ContributorField.withRole('Jan', 'aut'), ContributorField.withRole('Piet', 'prt')];
            const graph = await record.toGraph();

            expect(graph.countQuads(record.subjectNode, EDPOPREC('contributor'), null, null)).toBe(2);
            expect(graph.countQuads(null, RDF('type'), EDPOPREC('ContributorField'), null)).toBe(2);
        });

        it('should not link absent fields or empty lists', async () => {
            const record = bibliographicalRecord();
            record.genres = [];
            const graph = await record.toGraph();

            expect(graph.countQuads(record.subjectNode, EDPOPREC('genre'), null, null)).toBe(0);
            expect(graph.countQuads(record.subjectNode, EDPOPREC('title'), null, null)).toBe(0);
        });

        it('should keep blank nodes for fields of a record without identifier', async () => {
            const record = bibliographicalRecord(null);
            record.title = new Field('Een boek');
            const graph = await record.toGraph();

            const links = graph.getQuads(record.subjectNode, EDPOPREC('title'), null, null);
            expect(links).toHaveLength(1);
            expect(links[0]?.object.termType).toBe('BlankNode');
        });

        it('should produce the same graph twice', async () => {
            const record = bibliographicalRecord();
            record.title = new Field('Een boek');
            record.languages = [new LanguageField('Dutch')];
            const first = await record.toGraph();
            const second = await record.toGraph();

            expect(second.size).toBe(first.size);
            for (const triple of first.getQuads(null, null, null, null)) {
                expect(second.countQuads(triple.subject, triple.predicate, triple.object, null)).toBe(1);
            }
        });

        it('should reject a field of the wrong type', async () => {
            const record = new MisdeclaredRecord(bibliographicalReader);
            record.language = new Field('Dutch');
            await expect(record.toGraph()).rejects.toThrow(RecordError);
        });

        it('should accept a field of the declared type', async () => {
            const record = new MisdeclaredRecord(bibliographicalReader);
            record.language = new LanguageField('Dutch');
            const graph = await record.toGraph();
            expect(graph.countQuads(record.subjectNode, EDPOPREC('language'), null, null)).toBe(1);
        });

        it('should reject a registry entry with a type that is not a field', async () => {
            const record = new NonFieldTypeRecord(bibliographicalReader);
            await expect(record.toGraph()).rejects.toThrow(RecordError);
        });

        it('should pass field errors on', async () => {
            const record = bibliographicalRecord();
            record.title = new CountField('Een boek');
            await expect(record.toGraph()).rejects.toThrow(FieldError);
        });
    });

    describe('getDataDict', () => {
        it('should return plain data as it is', async () => {
            const record = bibliographicalRecord();
            record.data = { a: 1 };
            await expect(record.getDataDict()).resolves.toEqual({ a: 1 });
        });

        it('should return null without data', async () => {
            await expect(bibliographicalRecord().getDataDict()).resolves.toBeNull();
        });
    });

    describe('toString', () => {
        it('should show the title of a bibliographical record', () => {
            const record = bibliographicalRecord();
            record.title = new Field('Een boek');
            expect(record.toString()).toBe('Een boek');
        });

        it('should show the name of a biographical record', () => {
            const record = new BiographicalRecord(bibliographicalReader);
            record.name = new Field('Jan de Vries');
            expect(record.toString()).toBe('Jan de Vries');
        });

        it('should fall back to class and identifier', () => {
            expect(bibliographicalRecord().toString()).toBe('BibliographicalRecord object (1)');
            expect(new CatalogRecord(untypedReader).toString()).toBe('CatalogRecord object');
        });
    });
});
