import { DataFactory, Store, type BlankNode, type NamedNode, type Quad } from 'n3';
import { Field } from '../fields/field.js';
import { EDPOPREC, RDF, type Graph } from '../rdf/namespaces.js';
import { ReaderType, type CatalogDescriptor } from '../types/index.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

/**
 * Raised when a record's field registry is inconsistent with its values or
 * when a lazy record cannot be loaded.
 */
export class RecordError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RecordError';
    }
}

/**
 * Raw original data of a record that is not a plain object, for instance a
 * parsed MARC record. Only has to be able to render itself as one.
 */
export abstract class RawData {
    abstract toDict(): Record<string, unknown>;
}

export type RecordData = Record<string, unknown> | RawData;

/**
 * Constructor of a field type as declared in a registry entry.
 */
export type FieldType = abstract new (...args: never[]) => unknown;

/**
 * One entry of a record's field registry: the attribute name, the
 * predicate linking the record to the field, the expected field type and a
 * getter for the current value (a field, a list of fields or nothing).
 */
export interface FieldRegistryEntry {
    readonly name: string;
    readonly predicate: NamedNode;
    readonly fieldType: FieldType;
    readonly value: () => Field | Field[] | null;
}

export type RecordLoader<R extends CatalogRecord> = (record: R) => Promise<void>;

/**
 * Representation of edpoprec:Record.
 *
 * Create with the reader class as `fromReader` and set `identifier`,
 * `link`, `data` and the fields declared by the subclass. No fields are
 * declared here: subclasses register theirs by overriding `fields()`.
 *
 * A record becomes lazy once a loader is set with `setLoader()`; its
 * contents are then retrieved on the first `fetch()`, which `toGraph()`
 * and `getDataDict()` call implicitly.
 */
export class CatalogRecord {
    /** The reader class that created the record */
    readonly fromReader: CatalogDescriptor;

    /** Unique identifier used by the source catalog */
    identifier: string | null = null;

    /** A user-friendly link where the user can find the record */
    link: string | null = null;

    /** The raw original data of the record */
    data: RecordData | null = null;

    private readonly anonymousNode: BlankNode = blankNode();
    private namedSubject: NamedNode | null = null;
    private loader: (() => Promise<void>) | null = null;
    private loading: Promise<void> | null = null;
    private loaded = false;

    constructor(fromReader: CatalogDescriptor) {
        this.fromReader = fromReader;
    }

    /**
     * The IRI of the record, derived from its identifier by the reader
     * class, or null if the record has no identifier.
     */
    get iri(): string | null {
        return this.identifier ? this.fromReader.identifierToIri(this.identifier) : null;
    }

    /**
     * The node representing the record in RDF. Returns the same object on
     * every access as long as the identifier does not change.
     */
    get subjectNode(): NamedNode | BlankNode {
        const iri = this.iri;
        if (iri === null) {
            return this.anonymousNode;
        }
        if (this.namedSubject === null || this.namedSubject.value !== iri) {
            this.namedSubject = namedNode(iri);
        }
        return this.namedSubject;
    }

    /**
     * Registered fields, in serialization order.
     */
    protected fields(): FieldRegistryEntry[] {
        return [];
    }

    // ─── Lazy loading ─────────────────────────────────────────

    /**
     * True unless the record is lazy and its contents have not been
     * retrieved yet.
     */
    get fetched(): boolean {
        return this.loader === null || this.loaded;
    }

    /**
     * Make the record lazy: `loader` will be called once, on the first
     * `fetch()`, to fill in the record's data and fields.
     */
    setLoader(loader: RecordLoader<this>): void {
        this.loader = () => loader(this);
        this.loading = null;
        this.loaded = false;
    }

    /**
     * Retrieve the full contents of a lazy record. Does nothing for records
     * that are not lazy or have already been fetched; concurrent calls wait
     * for the same retrieval.
     */
    async fetch(): Promise<void> {
        if (this.fetched || this.loader === null) {
            return;
        }
        if (!this.identifier) {
            throw new RecordError(`Cannot fetch ${this.constructor.name} without an identifier`);
        }
        if (this.loading === null) {
            this.loading = this.load(this.loader, this.identifier);
        }
        return this.loading;
    }

    private async load(loader: () => Promise<void>, identifier: string): Promise<void> {
        try {
            await loader();
            this.loaded = true;
        } catch (error) {
            this.loading = null;
            if (error instanceof RecordError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new RecordError(`Could not fetch record ${identifier}: ${message}`);
        }
    }

    // ─── Serialization ────────────────────────────────────────

    /**
     * Build the RDF graph of the record and all of its fields. Fields are
     * bound to the record first, so they get IRIs derived from the record
     * IRI when there is one.
     */
    async toGraph(): Promise<Graph> {
        await this.fetch();

        const subject = this.subjectNode;
        const iri = this.iri;
        const quads: Quad[] = [quad(subject, RDF('type'), this.rdfClass())];

        const catalog = this.fromReader.CATALOG_URIREF;
        if (catalog) {
            quads.push(quad(subject, EDPOPREC('fromCatalog'), namedNode(catalog)));
        }
        if (this.identifier) {
            quads.push(quad(subject, EDPOPREC('identifier'), literal(this.identifier)));
        }
        if (this.link) {
            quads.push(quad(subject, EDPOPREC('publicURL'), literal(this.link)));
        }
        const data = this.dataAsDict();
        if (data !== null) {
            quads.push(quad(subject, EDPOPREC('originalData'), literal(JSON.stringify(data), RDF('JSON'))));
        }

        for (const entry of this.fields()) {
            if (!(entry.fieldType === Field || entry.fieldType.prototype instanceof Field)) {
                throw new RecordError(
                    `${entry.name} in ${this.constructor.name} is registered with type ` +
                    `${entry.fieldType.name}, but this type does not inherit from Field`
                );
            }
            const current = entry.value();
            const values = Array.isArray(current) ? current : [current];
            for (const value of values) {
                if (value === null) continue;
                const actualType = value.constructor.name;
                if (!(value instanceof entry.fieldType)) {
                    throw new RecordError(
                        `${entry.name} attribute is of type ${actualType} while an ` +
                        `instance of ${entry.fieldType.name} was expected`
                    );
                }
                value.bindTo(iri, entry.name);
                const fieldGraph = value.toGraph();
                quads.push(quad(subject, entry.predicate, value.subjectNode));
                quads.push(...fieldGraph.getQuads(null, null, null, null));
            }
        }

        return new Store(quads);
    }

    /**
     * The record's raw data as a plain object, or null if there is none.
     */
    async getDataDict(): Promise<Record<string, unknown> | null> {
        await this.fetch();
        return this.dataAsDict();
    }

    toString(): string {
        return this.identifier
            ? `${this.constructor.name} object (${this.identifier})`
            : `${this.constructor.name} object`;
    }

    private rdfClass(): NamedNode {
        switch (this.fromReader.READERTYPE) {
            case ReaderType.BIBLIOGRAPHICAL:
                return EDPOPREC('BibliographicalRecord');
            case ReaderType.BIOGRAPHICAL:
                return EDPOPREC('BiographicalRecord');
            default:
                return EDPOPREC('Record');
        }
    }

    private dataAsDict(): Record<string, unknown> | null {
        if (this.data instanceof RawData) {
            return this.data.toDict();
        }
        return this.data;
    }
}
