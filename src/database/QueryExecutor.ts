import type { Database } from 'better-sqlite3';

export type QueryParam = string | number | bigint | Buffer | null;
export type Row = Record<string, unknown>;

/**
 * Runs parameterized queries against the user store.
 *
 * `getSingleResult` expects exactly one row and throws {@link NoResultError}
 * or {@link NonUniqueResultError} otherwise.
 */
export interface QueryExecutor {
  getSingleResult(query: string, params: readonly QueryParam[]): Row;
  getResultList(query: string, params: readonly QueryParam[]): Row[];
}

export class NoResultError extends Error {
  constructor(public readonly query: string) {
    super('Query returned no rows');
    this.name = 'NoResultError';
  }
}

export class NonUniqueResultError extends Error {
  constructor(
    public readonly query: string,
    public readonly count: number,
  ) {
    super(`Query returned ${count} rows, expected exactly one`);
    this.name = 'NonUniqueResultError';
  }
}

// A row that does not have the columns the caller expects: the query is wrong, not the input.
export class InvalidRowError extends Error {
  constructor(
    public readonly query: string,
    public readonly issues: string[],
  ) {
    super(`Query returned a malformed row: ${issues.join('; ')}`);
    this.name = 'InvalidRowError';
  }
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

export class SqliteQueryExecutor implements QueryExecutor {
  constructor(private db: Database) {}

  getSingleResult(query: string, params: readonly QueryParam[]): Row {
    const rows = this.getResultList(query, params);
    if (rows.length === 0) throw new NoResultError(query);
    if (rows.length > 1) throw new NonUniqueResultError(query, rows.length);
    return rows[0];
  }

  getResultList(query: string, params: readonly QueryParam[]): Row[] {
    return this.db.prepare(query).all(...params).filter(isRow);
  }
}
