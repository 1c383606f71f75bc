import { ContributorField } from '../fields/contributor-field.js';
import { DatingField } from '../fields/dating-field.js';
import { DigitizationField } from '../fields/digitization-field.js';
import { Field } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import { SruReader, type SruRecordData } from '../readers/sru-reader.js';
import { BibliographicalRecord } from '../records/bibliographical-record.js';
import { ReaderType } from '../types/index.js';

const GALLICA_ARK = /^https:\/\/gallica\.bnf\.fr\/(ark:\/.+)$/;

/**
 * Strings of a Dublin Core element that occurs once or repeatedly.
 */
function forceList(value: unknown): string[] {
    const values = Array.isArray(value) ? value : [value];
    return values.filter((item): item is string => typeof item === 'string' && item.length > 0);
}

/**
 * One string for an element where a single value is expected but several
 * may occur.
 */
function forceString(value: unknown): string | null {
    const values = forceList(value);
    return values.length > 0 ? values.join(' ; ') : null;
}

/**
 * Gallica, the digital library of the Bibliothèque nationale de France,
 * through its SRU interface with Dublin Core records.
 */
export class GallicaReader extends SruReader {
    static override READERTYPE = ReaderType.BIBLIOGRAPHICAL;
    static override CATALOG_URIREF = 'https://edpop.hum.uu.nl/readers/gallica';
    static override IRI_PREFIX = 'https://edpop.hum.uu.nl/readers/gallica/';
    static override SHORT_NAME = 'Gallica';
    static override DESCRIPTION = 'The digital library of the Bibliothèque nationale de France and its partners';

    protected readonly sruUrl = 'https://gallica.bnf.fr/SRU';
    protected readonly sruVersion = '1.2';

    protected transformQuery(query: string): string {
        return `gallica all "${query.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
    }

    protected convertRecord(recordData: SruRecordData): BibliographicalRecord {
        const dc = recordData['dc'];
        const data: Record<string, unknown> = typeof dc === 'object' && dc !== null && !Array.isArray(dc)
            ? { ...dc }
            : {};
        const record = new BibliographicalRecord(GallicaReader);
        record.data = data;

        // The identifier element holds the Gallica URL among other
        // identifiers; the URL serves as identifier and as link.
        const url = forceList(data['identifier']).find((identifier) => identifier.startsWith('https://'));
        if (url) {
            record.identifier = url;
            record.link = url;
            const ark = GALLICA_ARK.exec(url)?.[1];
            if (ark) {
                const digitization = new DigitizationField(url);
                digitization.url = url;
                digitization.iiifManifest = `https://gallica.bnf.fr/iiif/${ark}/manifest.json`;
                record.digitization = [digitization];
            }
        }

        const title = forceString(data['title']);
        if (title) {
            record.title = new Field(title);
        }
        record.contributors = forceList(data['creator']).map((creator) => {
            const field = ContributorField.withRole(creator, 'aut');
            field.normalize();
            return field;
        });
        const dating = forceString(data['date']);
        if (dating) {
            record.dating = new DatingField(dating);
            record.dating.normalize();
        }
        record.languages = forceList(data['language']).map((language) => {
            const field = new LanguageField(language);
            field.normalize();
            return field;
        });
        const publisher = forceString(data['publisher']);
        if (publisher) {
            record.publisherOrPrinter = new Field(publisher);
        }
        record.genres = forceList(data['type']).map((type) => new Field(type));

        // The format element generally lists the number of views, the MIME
        // type and the extent; keep the extent.
        const extent = forceList(data['format']).find((format) =>
            !format.startsWith('Nombre total de vues') && !/^[a-z]+\/[a-z0-9.+-]+$/i.test(format)
        );
        if (extent) {
            record.extent = new Field(extent);
        }

        return record;
    }
}
