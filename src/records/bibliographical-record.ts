import { ContributorField } from '../fields/contributor-field.js';
import { DatingField } from '../fields/dating-field.js';
import { DigitizationField } from '../fields/digitization-field.js';
import { Field } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import { LocationField } from '../fields/location-field.js';
import { EDPOPREC } from '../rdf/namespaces.js';
import { CatalogRecord, type FieldRegistryEntry } from './record.js';

/**
 * Representation of edpoprec:BibliographicalRecord: a printed work or an
 * edition as described by a bibliographical catalog.
 */
export class BibliographicalRecord extends CatalogRecord {
    title: Field | null = null;
    alternativeTitles: Field[] | null = null;
    contributors: ContributorField[] | null = null;
    publisherOrPrinter: Field | null = null;
    placeOfPublication: LocationField | null = null;
    dating: DatingField | null = null;
    languages: LanguageField[] | null = null;
    extent: Field | null = null;
    size: Field | null = null;
    physicalDescription: Field | null = null;
    bookseller: Field | null = null;
    location: Field | null = null;
    format: Field | null = null;
    fingerprint: Field | null = null;
    collationFormula: Field | null = null;
    genres: Field[] | null = null;
    holdings: Field[] | null = null;
    digitization: DigitizationField[] | null = null;

    protected override fields(): FieldRegistryEntry[] {
        return [
            ...super.fields(),
            { name: 'title', predicate: EDPOPREC('title'), fieldType: Field, value: () => this.title },
            { name: 'alternativeTitles', predicate: EDPOPREC('alternativeTitle'), fieldType: Field, value: () => this.alternativeTitles },
            { name: 'contributors', predicate: EDPOPREC('contributor'), fieldType: ContributorField, value: () => this.contributors },
            { name: 'publisherOrPrinter', predicate: EDPOPREC('publisherOrPrinter'), fieldType: Field, value: () => this.publisherOrPrinter },
            { name: 'placeOfPublication', predicate: EDPOPREC('placeOfPublication'), fieldType: LocationField, value: () => this.placeOfPublication },
            { name: 'dating', predicate: EDPOPREC('dating'), fieldType: DatingField, value: () => this.dating },
            { name: 'languages', predicate: EDPOPREC('language'), fieldType: LanguageField, value: () => this.languages },
            { name: 'extent', predicate: EDPOPREC('extent'), fieldType: Field, value: () => this.extent },
            { name: 'size', predicate: EDPOPREC('size'), fieldType: Field, value: () => this.size },
            { name: 'physicalDescription', predicate: EDPOPREC('physicalDescription'), fieldType: Field, value: () => this.physicalDescription },
            { name: 'bookseller', predicate: EDPOPREC('bookseller'), fieldType: Field, value: () => this.bookseller },
            { name: 'location', predicate: EDPOPREC('location'), fieldType: Field, value: () => this.location },
            { name: 'format', predicate: EDPOPREC('format'), fieldType: Field, value: () => this.format },
            { name: 'fingerprint', predicate: EDPOPREC('fingerprint'), fieldType: Field, value: () => this.fingerprint },
            { name: 'collationFormula', predicate: EDPOPREC('collationFormula'), fieldType: Field, value: () => this.collationFormula },
            { name: 'genres', predicate: EDPOPREC('genre'), fieldType: Field, value: () => this.genres },
            { name: 'holdings', predicate: EDPOPREC('holdings'), fieldType: Field, value: () => this.holdings },
            { name: 'digitization', predicate: EDPOPREC('digitization'), fieldType: DigitizationField, value: () => this.digitization },
        ];
    }

    override toString(): string {
        return this.title ? this.title.toString() : super.toString();
    }
}
