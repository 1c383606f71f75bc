import type { ReaderClass } from '../readers/reader.js';
import { CerlThesaurusReader } from './cerl-thesaurus.js';
import { FbteeReader } from './fbtee.js';
import { GallicaReader } from './gallica.js';
import { SbtiReader } from './sbti.js';
import { StcnReader } from './stcn.js';

export { CerlThesaurusReader, FbteeReader, GallicaReader, SbtiReader, StcnReader };

/**
 * All catalogs available through this package.
 */
export const ALL_READERS: readonly ReaderClass[] = [
    GallicaReader,
    SbtiReader,
    CerlThesaurusReader,
    StcnReader,
    FbteeReader,
];

/**
 * Find a reader by its catalog slug (the last segment of its catalog IRI),
 * ignoring case.
 */
export function findReader(slug: string): ReaderClass | null {
    const wanted = slug.toLowerCase();
    return ALL_READERS.find((reader) => reader.getCatalogSlug()?.toLowerCase() === wanted) ?? null;
}
