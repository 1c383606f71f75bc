import { DatingField } from '../fields/dating-field.js';
import { Field } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import type { Graph } from '../rdf/namespaces.js';
import { SparqlReader } from '../readers/sparql-reader.js';
import { BibliographicalRecord } from '../records/bibliographical-record.js';
import { ReaderType } from '../types/index.js';

/** schema.org as used by the KB linked-data service (http, not https) */
const SCHEMA = 'http://schema.org/';

function objectValues(graph: Graph, subject: string, property: string): string[] {
    return graph.getObjects(subject, SCHEMA + property, null).map((object) => object.value);
}

/**
 * The Short-Title Catalogue Netherlands, through the linked-data SPARQL
 * endpoint of the KB, National Library of the Netherlands.
 */
export class StcnReader extends SparqlReader<BibliographicalRecord> {
    static override READERTYPE = ReaderType.BIBLIOGRAPHICAL;
    static override CATALOG_URIREF = 'https://edpop.hum.uu.nl/readers/stcn';
    static override SHORT_NAME = 'Short-Title Catalogue Netherlands (STCN)';
    static override DESCRIPTION = 'The retrospective national bibliography of the Netherlands up to 1801';

    protected readonly endpoint = 'http://data.bibliotheken.nl/sparql';
    protected readonly filter =
        '?s schema:mainEntityOfPage/schema:isPartOf <http://data.bibliotheken.nl/id/dataset/stcn> .';

    protected createRecord(name: string | null): BibliographicalRecord {
        const record = new BibliographicalRecord(StcnReader);
        if (name) {
            record.title = new Field(name);
        }
        return record;
    }

    protected populateRecord(record: BibliographicalRecord, graph: Graph): void {
        const subject = record.identifier;
        if (!subject) return;

        const [title] = objectValues(graph, subject, 'name');
        if (title) {
            record.title = new Field(title);
        }
        const alternativeTitles = objectValues(graph, subject, 'alternateName');
        if (alternativeTitles.length > 0) {
            record.alternativeTitles = alternativeTitles.map((text) => new Field(text));
        }
        const [published] = objectValues(graph, subject, 'datePublished');
        if (published) {
            record.dating = new DatingField(published);
            record.dating.normalize();
        }
        const languages = objectValues(graph, subject, 'inLanguage');
        if (languages.length > 0) {
            record.languages = languages.map((text) => {
                const field = new LanguageField(text);
                field.normalize();
                return field;
            });
        }
        const [pages] = objectValues(graph, subject, 'numberOfPages');
        if (pages) {
            record.extent = new Field(pages);
        }
        const [format] = objectValues(graph, subject, 'bookFormat');
        if (format) {
            record.format = new Field(format);
        }
        const [description] = objectValues(graph, subject, 'description');
        if (description) {
            record.physicalDescription = new Field(description);
        }
    }
}
