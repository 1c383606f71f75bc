import { describe, it, expect } from 'vitest';
import type { BlankNode, NamedNode } from 'n3';
import { ContributorField } from '../fields/contributor-field.js';
import { DatingField } from '../fields/dating-field.js';
import { DigitizationField } from '../fields/digitization-field.js';
import { Field, FieldError, NormalizationResult, type Subfield } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import { LocationField } from '../fields/location-field.js';
import { EDPOPREC, EDTF_DATATYPE, RDF, XSD } from '../rdf/namespaces.js';

/**
 * Field with a subfield that may hold a value of the wrong type.
 */
class PagesField extends Field {
    pages: string | number | null = null;

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'pages', predicate: EDPOPREC('pages'), datatype: 'string', value: () => this.pages },
        ];
    }
}

class UnknownDatatypeField extends Field {
    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'pages', predicate: EDPOPREC('pages'), datatype: 'nonexistent', value: () => 'x' },
        ];
    }
}

function objectsOf(field: Field, predicate: NamedNode): string[] {
    return field.toGraph().getObjects(field.subjectNode, predicate, null).map((object) => object.value);
}

describe('Field', () => {
    it('should reject an original text that is not a string', () => {
        const notAString: string = JSON.parse('5');
        expect(() => new Field(notAString)).toThrow(FieldError);
    });

    it('should emit its type and original text', () => {
        const field = new Field('Amsterdam');
        const graph = field.toGraph();

        expect(graph.countQuads(field.subjectNode, RDF('type'), EDPOPREC('Field'), null)).toBe(1);
        const [text] = graph.getObjects(field.subjectNode, EDPOPREC('originalText'), null);
        expect(text?.value).toBe('Amsterdam');
        expect(text?.termType).toBe('Literal');
    });

    it('should emit unknown as a boolean literal', () => {
        const field = new Field('s.n.');
        field.unknown = true;

        const [unknown] = field.toGraph().getObjects(field.subjectNode, EDPOPREC('unknown'), null);
        expect(unknown?.value).toBe('true');
        expect(unknown?.termType === 'Literal' && unknown.datatype.value).toBe(XSD('boolean').value);
    });

    it('should emit the authority record as an IRI', () => {
        const field = new Field('Elzevier');
        field.authorityRecord = 'https://example.org/authority/1';

        const [authority] = field.toGraph().getObjects(field.subjectNode, EDPOPREC('authorityRecord'), null);
        expect(authority?.termType).toBe('NamedNode');
        expect(authority?.value).toBe('https://example.org/authority/1');
    });

    it('should leave out subfields without a value', () => {
        const field = new Field('x');
        expect(field.toGraph().size).toBe(2);
        expect(objectsOf(field, EDPOPREC('unknown'))).toEqual([]);
    });

    it('should fail on a subfield value of the wrong type', () => {
        const field = new PagesField('12 p.');
        field.pages = 12;
        expect(() => field.toGraph()).toThrow(FieldError);
    });

    it('should accept a subfield value of the right type', () => {
        const field = new PagesField('12 p.');
        field.pages = '12';
        expect(objectsOf(field, EDPOPREC('pages'))).toEqual(['12']);
    });

    it('should fail on an unknown datatype', () => {
        expect(() => new UnknownDatatypeField('x').toGraph()).toThrow(FieldError);
    });

    it('should use its original text as string representation', () => {
        expect(String(new Field('Leiden'))).toBe('Leiden');
    });

    it('should not normalize in the base class', () => {
        expect(new Field('Leiden').normalize()).toBe(NormalizationResult.NO_DATA);
    });

    describe('subject node', () => {
        it('should be the same blank node on every access', () => {
            const field = new Field('x');
            const node: NamedNode | BlankNode = field.subjectNode;
            expect(node.termType).toBe('BlankNode');
            expect(field.subjectNode).toBe(node);
        });

        it('should be an IRI derived from the record when bound', () => {
            const field = new Field('x');
            field.bindTo('https://example.org/records/1', 'title');
            const node = field.subjectNode;

            expect(node.termType).toBe('NamedNode');
            expect(node.value).toMatch(/^https:\/\/example\.org\/records\/1#title-[0-9a-f]{16}$/);
        });

        it('should be equal for equal content under the same record', () => {
            const first = new Field('x');
            const second = new Field('x');
            first.bindTo('https://example.org/records/1', 'title');
            second.bindTo('https://example.org/records/1', 'title');
            expect(first.subjectNode.value).toBe(second.subjectNode.value);
        });

        it('should differ across records and across content', () => {
            const field = new Field('x');
            field.bindTo('https://example.org/records/1', 'title');
            const other = new Field('x');
            other.bindTo('https://example.org/records/2', 'title');
            const different = new Field('y');
            different.bindTo('https://example.org/records/1', 'title');

            expect(field.subjectNode.value).not.toBe(other.subjectNode.value);
            expect(field.subjectNode.value).not.toBe(different.subjectNode.value);
        });

        it('should stay a blank node when bound to a record without IRI', () => {
            const field = new Field('x');
            field.bindTo(null, 'title');
            expect(field.subjectNode.termType).toBe('BlankNode');
        });
    });
});

describe('LanguageField', () => {
    it('should normalize a language name to an ISO 639-3 code', () => {
        const field = new LanguageField('Dutch');
        expect(field.normalize()).toBe(NormalizationResult.SUCCESS);
        expect(field.languageCode).toBe('nld');
        expect(field.summaryText).toBe('Dutch');
    });

    it('should normalize bibliographic and two-letter codes', () => {
        const french = new LanguageField('fre');
        french.normalize();
        const german = new LanguageField('de');
        german.normalize();

        expect(french.languageCode).toBe('fra');
        expect(german.languageCode).toBe('deu');
    });

    it('should report unrecognized languages and empty text', () => {
        expect(new LanguageField('Klingon').normalize()).toBe(NormalizationResult.FAIL);
        expect(new LanguageField('  ').normalize()).toBe(NormalizationResult.NO_DATA);
    });

    it('should emit its type and language code', () => {
        const field = new LanguageField('Latin');
        field.normalize();
        const graph = field.toGraph();

        const [type] = graph.getObjects(field.subjectNode, RDF('type'), null);
        expect(type?.value).toBe(EDPOPREC('LanguageField').value);
        expect(objectsOf(field, EDPOPREC('languageCode'))).toEqual(['lat']);
        expect(objectsOf(field, EDPOPREC('summaryText'))).toEqual(['Latin']);
    });
});

describe('ContributorField', () => {
    it('should summarize name and role', () => {
        const field = ContributorField.withRole(' Jan  de Vries ', 'aut');
        expect(field.normalize()).toBe(NormalizationResult.SUCCESS);
        expect(field.name).toBe('Jan de Vries');
        expect(field.summaryText).toBe('Jan de Vries (author)');
        expect(String(field)).toBe('Jan de Vries (author)');
    });

    it('should summarize the name alone without role', () => {
        const field = new ContributorField('Hendrick Hondius');
        field.normalize();
        expect(field.summaryText).toBe('Hendrick Hondius');
    });

    it('should emit the role as a relator IRI', () => {
        const field = ContributorField.withRole('Joan Blaeu', 'prt');
        const [role] = field.toGraph().getObjects(field.subjectNode, EDPOPREC('role'), null);
        expect(role?.termType).toBe('NamedNode');
        expect(role?.value).toBe('http://id.loc.gov/vocabulary/relators/prt');
    });
});

describe('DatingField', () => {
    it.each([
        ['1650', '1650'],
        ['1650?', '1650?'],
        ['ca. 1650', '1650~'],
        ['circa 1650', '1650~'],
        ['[1650]', '1650'],
        ['1650-1660', '1650/1660'],
        ['165-', '165X'],
    ])('should normalize %s to %s', (text, edtf) => {
        const field = new DatingField(text);
        expect(field.normalize()).toBe(NormalizationResult.SUCCESS);
        expect(field.edtfDate).toBe(edtf);
    });

    it('should fail on text that is not a date', () => {
        const field = new DatingField('in the reign of Louis XIV');
        expect(field.normalize()).toBe(NormalizationResult.FAIL);
        expect(field.edtfDate).toBeNull();
    });

    it('should be idempotent', () => {
        const field = new DatingField('ca. 1650');
        field.normalize();
        field.normalize();
        expect(field.edtfDate).toBe('1650~');
    });

    it('should emit the EDTF date with its datatype', () => {
        const field = new DatingField('1650');
        field.normalize();
        const [date] = field.toGraph().getObjects(field.subjectNode, EDPOPREC('edtfDate'), null);
        expect(date?.value).toBe('1650');
        expect(date?.termType === 'Literal' && date.datatype.value).toBe(EDTF_DATATYPE.value);
    });
});

describe('LocationField and DigitizationField', () => {
    it('should emit the location type as an IRI', () => {
        const field = new LocationField('Leiden');
        field.locationType = LocationField.LOCALITY;
        expect(objectsOf(field, EDPOPREC('locationType'))).toEqual([EDPOPREC('locality').value]);
    });

    it('should emit url and manifest', () => {
        const field = new DigitizationField('https://example.org/book');
        field.url = 'https://example.org/book';
        field.iiifManifest = 'https://example.org/iiif/book/manifest.json';

        expect(objectsOf(field, EDPOPREC('url'))).toEqual(['https://example.org/book']);
        expect(objectsOf(field, EDPOPREC('iiifManifest'))).toEqual(['https://example.org/iiif/book/manifest.json']);
    });
});
