/**
 * Kind of catalog a reader gives access to. Determines the RDF class of the
 * catalog and of its records.
 */
export enum ReaderType {
    BIBLIOGRAPHICAL = 'bibliographical',
    BIOGRAPHICAL = 'biographical',
}

/**
 * Marker for structured prepared queries. Queries that fit in a single string
 * are passed around as plain strings instead.
 */
export interface BasePreparedQuery {
    readonly kind: string;
}

export type PreparedQuery = string | BasePreparedQuery;

/**
 * The class-level metadata a record needs from the reader class that
 * created it. Every reader class satisfies this through its static members.
 */
export interface CatalogDescriptor {
    readonly name: string;
    readonly READERTYPE: ReaderType | null;
    readonly CATALOG_URIREF: string | null;
    identifierToIri(identifier: string): string;
}
