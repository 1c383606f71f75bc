import { ALL_READERS, findReader } from '../catalogs/index.js';
import { graphToTurtle } from '../rdf/namespaces.js';
import { IndexRange } from '../readers/index-range.js';
import { ReaderError, type ReaderClass } from '../readers/reader.js';

export interface SearchOptions {
    /** Number of records to fetch */
    number: number;
    /** Number of results to skip */
    start?: number;
}

export interface SearchResult {
    numberOfResults: number;
    lines: string[];
}

/**
 * The reader for a catalog slug, or a ReaderError listing the known ones.
 */
export function requireReader(slug: string): ReaderClass {
    const reader = findReader(slug);
    if (!reader) {
        const known = ALL_READERS.map((candidate) => candidate.getCatalogSlug()).join(', ');
        throw new ReaderError(`Unknown catalog: ${slug}. Available catalogs: ${known}`);
    }
    return reader;
}

/**
 * One line per catalog: slug, type and name.
 */
export function listCatalogs(): string[] {
    return ALL_READERS.map((reader) => {
        const slug = reader.getCatalogSlug() ?? reader.name;
        const type = reader.READERTYPE ?? 'other';
        return `${slug.padEnd(16)}${type.padEnd(17)}${reader.SHORT_NAME ?? ''}`;
    });
}

export async function searchCatalog(slug: string, query: string, options: SearchOptions): Promise<SearchResult> {
    const readerClass = requireReader(slug);
    const reader = new readerClass();
    reader.prepareQuery(query);
    if (options.start) {
        reader.adjustStartRecord(options.start);
    }
    const range = await reader.fetch(options.number);
    // Readers that fetch everything at once return more than was asked for
    const start = options.start ?? 0;
    const shown = new IndexRange(Math.max(range.start, start), Math.min(range.stop, start + options.number));

    const lines: string[] = [];
    for (const index of shown) {
        const record = reader.records.get(index);
        if (record) {
            lines.push(`${index + 1}. ${record.toString()}`);
        }
    }
    return { numberOfResults: reader.numberOfResults ?? 0, lines };
}

/**
 * Turtle of a single record.
 */
export async function showRecord(slug: string, identifier: string): Promise<string> {
    const record = await requireReader(slug).getById(identifier);
    return graphToTurtle(await record.toGraph());
}

/**
 * Turtle of the catalog's own description.
 */
export async function describeCatalog(slug: string): Promise<string> {
    return graphToTurtle(requireReader(slug).catalogToGraph());
}
