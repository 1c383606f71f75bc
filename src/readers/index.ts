export { IndexRange } from './index-range.js';
export { NotFoundError, Reader, ReaderError, type ReaderClass } from './reader.js';
export { getByIdBasedOnQuery, type QueryBasedLookup } from './get-by-id-based-on-query.js';
export { DatabaseFile, type DatabaseFileOptions } from './database-file.js';
export { sqlQuery, type SqlArgument, type SqlPreparedQuery } from './sql.js';
export { SruReader, type SruRecordData } from './sru-reader.js';
export { SparqlReader, escapeSparqlString } from './sparql-reader.js';
export { CerlReader, type CerlRow } from './cerl-reader.js';
