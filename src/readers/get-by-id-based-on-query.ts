import type { CatalogRecord } from '../records/record.js';
import type { PreparedQuery } from '../types/index.js';
import { NotFoundError, type Reader } from './reader.js';

/**
 * Capability of readers for APIs without a way to retrieve single records:
 * they look a record up through a list query that is expected to contain
 * it.
 */
export interface QueryBasedLookup<Q extends PreparedQuery> {
    /** The list query that should return the record with `identifier` */
    prepareGetByIdQuery(identifier: string): Q;
}

/**
 * Get a single record through a list query: run the first page of the
 * query from `prepareGetByIdQuery()` on a fresh reader and pick the record
 * with the requested identifier. The first match wins.
 *
 * @throws NotFoundError if the query has no results or the record is not
 * among the first page of results
 */
export async function getByIdBasedOnQuery<Q extends PreparedQuery>(
    readerClass: new () => Reader<Q> & QueryBasedLookup<Q>,
    identifier: string
): Promise<CatalogRecord> {
    const reader = new readerClass();
    reader.setQuery(reader.prepareGetByIdQuery(identifier));
    await reader.fetch();

    if (reader.numberOfResults === 0) {
        throw new NotFoundError('No results returned');
    }
    const indexes = [...reader.records.keys()].sort((a, b) => a - b);
    for (const index of indexes) {
        const record = reader.records.get(index);
        if (record?.identifier === identifier) {
            return record;
        }
    }
    throw new NotFoundError(
        `Record with identifier ${identifier} not present among ${reader.numberOfResults} returned results.`
    );
}
