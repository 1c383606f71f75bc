import { DataFactory, Writer, type NamedNode, type Store } from 'n3';

const { namedNode } = DataFactory;

/**
 * In-memory RDF graph. Records, fields and catalogs all serialize into one.
 */
export type Graph = Store;

export type Namespace = (term: string) => NamedNode;

function namespace(base: string): Namespace {
    return (term: string) => namedNode(base + term);
}

export const EDPOPREC_BASE = 'https://dhstatic.hum.uu.nl/edpop-records/latest/';
export const RDF_BASE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_BASE = 'http://www.w3.org/2000/01/rdf-schema#';
export const SDO_BASE = 'https://schema.org/';
export const XSD_BASE = 'http://www.w3.org/2001/XMLSchema#';
export const RELATORS_BASE = 'http://id.loc.gov/vocabulary/relators/';

/** EDPOP Record Ontology */
export const EDPOPREC = namespace(EDPOPREC_BASE);
export const RDF = namespace(RDF_BASE);
export const RDFS = namespace(RDFS_BASE);
export const SDO = namespace(SDO_BASE);
export const XSD = namespace(XSD_BASE);
/** Library of Congress relators. See: https://id.loc.gov/vocabulary/relators.html */
export const RELATORS = namespace(RELATORS_BASE);

/** Datatype of Extended Date/Time Format literals. */
export const EDTF_DATATYPE = namedNode('http://id.loc.gov/datatypes/edtf/EDTF');

/**
 * Prefixes bound on every serialized graph.
 */
export const COMMON_PREFIXES: Record<string, string> = {
    rdf: RDF_BASE,
    rdfs: RDFS_BASE,
    edpoprec: EDPOPREC_BASE,
    schema: SDO_BASE,
    relators: RELATORS_BASE,
};

/**
 * Serialize a graph as Turtle with the common prefixes.
 */
export function graphToTurtle(graph: Graph): Promise<string> {
    const writer = new Writer({ prefixes: COMMON_PREFIXES });
    writer.addQuads(graph.getQuads(null, null, null, null));
    return new Promise((resolve, reject) => {
        writer.end((error, result: string) => {
            if (error) reject(error);
            else resolve(result);
        });
    });
}
