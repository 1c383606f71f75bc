import { createHash } from 'node:crypto';
import { DataFactory, Store, type BlankNode, type NamedNode, type Literal, type Quad } from 'n3';
import { EDPOPREC, EDTF_DATATYPE, RDF, XSD, type Graph } from '../rdf/namespaces.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

/**
 * Raised when a field cannot be constructed or serialized.
 */
export class FieldError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FieldError';
    }
}

export enum NormalizationResult {
    SUCCESS = 'success',
    NO_DATA = 'nodata',
    FAIL = 'fail',
}

type SubfieldValue = string | boolean;

interface Datatype {
    readonly inputType: 'string' | 'boolean';
    convert(value: SubfieldValue): NamedNode | Literal;
}

/**
 * Datatypes a subfield can declare, keyed by name. The input type is
 * checked strictly; there is no coercion.
 */
export const DATATYPES: Readonly<Record<string, Datatype>> = {
    string: {
        inputType: 'string',
        convert: (value) => literal(String(value)),
    },
    boolean: {
        inputType: 'boolean',
        convert: (value) => literal(String(value), XSD('boolean')),
    },
    edtf: {
        inputType: 'string',
        convert: (value) => literal(String(value), EDTF_DATATYPE),
    },
    uriref: {
        inputType: 'string',
        convert: (value) => namedNode(String(value)),
    },
};

/**
 * A sub-attribute of a field as it appears in RDF: the attribute name, the
 * predicate, the datatype name and a getter for the current value.
 */
export interface Subfield {
    readonly name: string;
    readonly predicate: NamedNode;
    readonly datatype: string;
    readonly value: () => unknown;
}

interface FieldBinding {
    readonly parentIri: string;
    readonly attributeName: string;
}

/**
 * Representation of edpoprec:Field: one value taken from a catalog record.
 *
 * Instantiate with the original text, which is the only required
 * attribute, and call `toGraph()` to obtain RDF. Subclasses override
 * `rdfClass`, extend `subfields()` with their own sub-attributes and may
 * provide a normalization strategy through `normalize()`.
 *
 * The subject node is a blank node, unless the field has been bound to a
 * record that has an IRI: then it is an IRI derived from the record IRI,
 * the attribute name and a hash of the field's content.
 */
export class Field {
    protected readonly rdfClass: NamedNode = EDPOPREC('Field');

    /** The text as it was directly taken from the original record */
    readonly originalText: string;

    /** Whether the source explicitly marks the value as unknown */
    unknown: boolean | null = null;

    /** IRI of a record in an authority file describing the same entity */
    authorityRecord: string | null = null;

    private readonly anonymousNode: BlankNode = blankNode();
    private binding: FieldBinding | null = null;

    constructor(originalText: string) {
        if (typeof originalText !== 'string') {
            throw new FieldError(
                `Original text of ${this.constructor.name} should be a string but it is ${typeof originalText}`
            );
        }
        this.originalText = originalText;
    }

    /**
     * Human-readable summary combining normalized sub-attributes, or null
     * if the field type does not define one.
     */
    get summaryText(): string | null {
        return null;
    }

    get subjectNode(): NamedNode | BlankNode {
        if (this.binding === null) {
            return this.anonymousNode;
        }
        const { parentIri, attributeName } = this.binding;
        return namedNode(`${parentIri}#${attributeName}-${this.contentHash()}`);
    }

    /**
     * Bind the field to the record attribute holding it. Pass null as the
     * parent IRI for records without an IRI, which keeps the blank node.
     */
    bindTo(parentIri: string | null, attributeName: string): void {
        this.binding = parentIri === null ? null : { parentIri, attributeName };
    }

    /**
     * Derive normalized sub-attributes from the original text. The base
     * field has no normalization.
     */
    normalize(): NormalizationResult {
        return NormalizationResult.NO_DATA;
    }

    protected subfields(): Subfield[] {
        return [
            { name: 'original_text', predicate: EDPOPREC('originalText'), datatype: 'string', value: () => this.originalText },
            { name: 'summary_text', predicate: EDPOPREC('summaryText'), datatype: 'string', value: () => this.summaryText },
            { name: 'unknown', predicate: EDPOPREC('unknown'), datatype: 'boolean', value: () => this.unknown },
            { name: 'authority_record', predicate: EDPOPREC('authorityRecord'), datatype: 'uriref', value: () => this.authorityRecord },
        ];
    }

    toGraph(): Graph {
        const subject = this.subjectNode;
        const quads: Quad[] = [quad(subject, RDF('type'), this.rdfClass)];

        for (const subfield of this.subfields()) {
            const value = subfield.value();
            if (value === null || value === undefined) {
                continue;
            }
            const datatype = DATATYPES[subfield.datatype];
            if (!datatype) {
                throw new FieldError(
                    `Datatype '${subfield.datatype}' was defined in subfield list on ${this.constructor.name} but it does not exist`
                );
            }
            if ((typeof value !== 'string' && typeof value !== 'boolean') || typeof value !== datatype.inputType) {
                throw new FieldError(
                    `Subfield ${subfield.name} should be of type ${datatype.inputType} but it is ${typeof value}`
                );
            }
            quads.push(quad(subject, subfield.predicate, datatype.convert(value)));
        }

        return new Store(quads);
    }

    toString(): string {
        return this.summaryText ?? this.originalText;
    }

    private contentHash(): string {
        const content = [
            this.rdfClass.value,
            ...this.subfields().map((subfield) => [subfield.name, subfield.value() ?? null]),
        ];
        return createHash('sha256').update(JSON.stringify(content)).digest('hex').slice(0, 16);
    }
}
