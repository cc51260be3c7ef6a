import type { QueryResult, QueryResultRow } from 'pg';
import type { SqlPool, SqlPoolClient } from '../db/client';

export interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

/** Returns rows for a statement, or throws to simulate a database error */
export type QueryHandler = (text: string, values: unknown[] | undefined) => QueryResultRow[];

function toResult<R extends QueryResultRow>(rows: QueryResultRow[]): QueryResult<R> {
  return {
    command: '',
    rowCount: rows.length,
    oid: 0,
    fields: [],
    // Test double: rows are whatever the handler scripted
    rows: rows as R[],
  };
}

/**
 * pg stand-in that records statements and answers from a handler.
 * Pool-level queries and client queries share one log.
 */
export class FakeSqlPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  readonly released: Array<Error | boolean | undefined> = [];
  connectError: Error | null = null;

  constructor(private handler: QueryHandler = () => []) {}

  setHandler(handler: QueryHandler): void {
    this.handler = handler;
  }

  get statements(): string[] {
    return this.queries.map(query => query.text.trim().split(/\s+/)[0]);
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>> {
    this.queries.push({ text, values });
    return toResult<R>(this.handler(text, values));
  }

  async connect(): Promise<SqlPoolClient> {
    if (this.connectError) throw this.connectError;
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        this.query<R>(text, values),
      release: (err) => {
        this.released.push(err);
      },
    };
  }
}
