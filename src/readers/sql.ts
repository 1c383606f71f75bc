import type { BasePreparedQuery } from '../types/index.js';

export type SqlArgument = string | number;

/**
 * Prepared query of readers backed by an SQLite database: a WHERE clause
 * with `?` placeholders and the values to bind to them.
 */
export interface SqlPreparedQuery extends BasePreparedQuery {
    readonly kind: 'sql';
    readonly whereStatement: string;
    readonly arguments: readonly SqlArgument[];
}

export function sqlQuery(whereStatement: string, args: readonly SqlArgument[]): SqlPreparedQuery {
    return { kind: 'sql', whereStatement, arguments: args };
}
