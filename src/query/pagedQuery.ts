import type Database from 'better-sqlite3';

import type { SqlValue } from '../storage/fieldCodec.js';

export interface PageOptions {
  /** rows fetched per engine round trip */
  pageSize: number;
  /** stop after this many results; 0 or absent means unlimited */
  maxrows?: number;
}

/**
 * Lazy, finite and restartable result sequence.
 *
 * Every iteration starts from the first row again. Pages are read with
 * `LIMIT ? OFFSET ?` (the statement takes them as its last two parameters)
 * and fully materialized, so no engine cursor stays open while the caller
 * runs other statements between yields.
 */
export class PagedQuery<TRow, TOut> implements Iterable<TOut> {
  constructor(
    private readonly statement: Database.Statement<SqlValue[], TRow>,
    private readonly params: readonly SqlValue[],
    private readonly options: PageOptions,
    private readonly map: (row: TRow) => TOut | undefined,
  ) {}

  *[Symbol.iterator](): IterableIterator<TOut> {
    const pageSize = Math.max(1, this.options.pageSize);
    const maxrows = this.options.maxrows ?? 0;
    let offset = 0;
    let produced = 0;
    while (true) {
      const rows = this.statement.all(...this.params, pageSize, offset);
      for (const row of rows) {
        const value = this.map(row);
        if (value === undefined) continue;
        yield value;
        produced += 1;
        if (maxrows > 0 && produced >= maxrows) return;
      }
      if (rows.length < pageSize) return;
      offset += rows.length;
    }
  }

  all(): TOut[] {
    return [...this];
  }

  first(): TOut | undefined {
    for (const value of this) return value;
    return undefined;
  }
}
