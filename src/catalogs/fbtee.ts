import Database from 'better-sqlite3';
import { z } from 'zod';
import { ContributorField } from '../fields/contributor-field.js';
import { DatingField } from '../fields/dating-field.js';
import { Field } from '../fields/field.js';
import { LanguageField } from '../fields/language-field.js';
import { LocationField } from '../fields/location-field.js';
import { DatabaseFile } from '../readers/database-file.js';
import { getByIdBasedOnQuery, type QueryBasedLookup } from '../readers/get-by-id-based-on-query.js';
import { IndexRange } from '../readers/index-range.js';
import { Reader, ReaderError } from '../readers/reader.js';
import { sqlQuery, type SqlPreparedQuery } from '../readers/sql.js';
import type { CatalogRecord } from '../records/record.js';
import { BibliographicalRecord } from '../records/bibliographical-record.js';
import { ReaderType } from '../types/index.js';

const FBTEE_LINK = 'http://fbtee.uws.edu.au/stn/interface/browse.php?t=book&id=';

const text = z.union([z.string(), z.number()]).nullable().optional();

const bookRowSchema = z
    .object({
        book_code: z.string(),
        full_book_title: z.string().nullable(),
        languages: text,
        pages: text,
        stated_publication_places: text,
        stated_publication_years: text,
        stated_publishers: text,
        author_code__: z.string().nullable(),
        author_name__: z.string().nullable(),
    })
    .passthrough();

type BookRow = z.infer<typeof bookRowSchema>;

interface Author {
    code: string;
    name: string | null;
}

function asText(value: string | number | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const result = String(value).trim();
    return result || null;
}

/**
 * The French Book Trade in Enlightenment Europe database, of which the
 * books table is read from a downloaded SQLite file.
 */
export class FbteeReader extends Reader<SqlPreparedQuery> implements QueryBasedLookup<SqlPreparedQuery> {
    static override READERTYPE = ReaderType.BIBLIOGRAPHICAL;
    static override CATALOG_URIREF = 'https://edpop.hum.uu.nl/readers/fbtee';
    static override IRI_PREFIX = 'https://edpop.hum.uu.nl/readers/fbtee/';
    static override SHORT_NAME = 'French Book Trade in Enlightenment Europe (FBTEE)';
    static override DESCRIPTION =
        'Books traded by the Société typographique de Neuchâtel, 1769-1794';
    static override FETCH_ALL_AT_ONCE = true;

    readonly database = new DatabaseFile({
        readerName: 'FbteeReader',
        filename: 'cl.sqlite3',
        url: 'https://dhstatic.hum.uu.nl/edpop/cl.sqlite3',
        license: 'https://dhstatic.hum.uu.nl/edpop/LICENSE.txt',
    });

    static async getById(this: new () => FbteeReader, identifier: string): Promise<CatalogRecord> {
        return getByIdBasedOnQuery(this, identifier);
    }

    protected transformQuery(query: string): SqlPreparedQuery {
        return sqlQuery('WHERE B.full_book_title LIKE ?', [`%${query}%`]);
    }

    prepareGetByIdQuery(identifier: string): SqlPreparedQuery {
        return sqlQuery('WHERE B.book_code = ?', [identifier]);
    }

    async fetchRange(range: IndexRange): Promise<IndexRange> {
        const query = this.requireQuery();
        if (this.fetchingStarted) {
            return new IndexRange(range.start, range.start);
        }
        const path = await this.database.prepare();

        let rows: unknown[];
        const db = new Database(path, { readonly: true, fileMustExist: true });
        try {
            rows = db
                .prepare(
                    'SELECT B.*, A.author_code AS author_code__, A.author_name AS author_name__ FROM books B ' +
                    'LEFT OUTER JOIN books_authors BA ON B.book_code = BA.book_code ' +
                    'LEFT OUTER JOIN authors A ON BA.author_code = A.author_code ' +
                    `${query.whereStatement} ORDER BY B.book_code`
                )
                .all(...query.arguments);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ReaderError(`Error querying FBTEE database: ${message}`);
        } finally {
            db.close();
        }

        const records = this.groupBooks(rows);
        records.forEach((record, index) => this.records.set(index, record));
        this.numberOfResults = records.length;
        return new IndexRange(0, records.length);
    }

    /**
     * Rows are books joined with their authors, so a book spans as many
     * consecutive rows as it has authors.
     */
    private groupBooks(rows: unknown[]): BibliographicalRecord[] {
        const books: Array<{ book: Record<string, unknown>; row: BookRow; authors: Author[] }> = [];
        for (const raw of rows) {
            const parsed = bookRowSchema.safeParse(raw);
            if (!parsed.success) {
                throw new ReaderError(`Unexpected row in FBTEE database: ${parsed.error.issues[0]?.message ?? 'invalid structure'}`);
            }
            const { author_code__: authorCode, author_name__: authorName, ...book } = parsed.data;
            let current = books[books.length - 1];
            if (current === undefined || current.row.book_code !== book.book_code) {
                current = { book, row: parsed.data, authors: [] };
                books.push(current);
            }
            if (authorCode !== null) {
                current.authors.push({ code: authorCode, name: authorName });
            }
        }
        return books.map(({ book, row, authors }) => this.convertRecord(book, row, authors));
    }

    private convertRecord(book: Record<string, unknown>, row: BookRow, authors: Author[]): BibliographicalRecord {
        const record = new BibliographicalRecord(FbteeReader);
        record.identifier = row.book_code;
        record.link = FBTEE_LINK + encodeURIComponent(row.book_code);
        record.data = { ...book, authors };

        if (row.full_book_title) {
            record.title = new Field(row.full_book_title);
        }
        const languages = asText(row.languages);
        if (languages) {
            record.languages = languages.split(', ').map((language) => {
                const field = new LanguageField(language);
                field.normalize();
                return field;
            });
        }
        const pages = asText(row.pages);
        if (pages) {
            record.extent = new Field(pages);
        }
        const place = asText(row.stated_publication_places);
        if (place) {
            record.placeOfPublication = new LocationField(place);
            record.placeOfPublication.locationType = LocationField.LOCALITY;
        }
        const year = asText(row.stated_publication_years);
        if (year) {
            record.dating = new DatingField(year);
            record.dating.normalize();
        }
        const publisher = asText(row.stated_publishers);
        if (publisher) {
            record.publisherOrPrinter = new Field(publisher);
        }
        record.contributors = authors
            .filter((author): author is { code: string; name: string } => author.name !== null)
            .map((author) => {
                const field = ContributorField.withRole(author.name, 'aut');
                field.normalize();
                return field;
            });
        return record;
    }
}
