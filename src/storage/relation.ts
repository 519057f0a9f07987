/**
 * NodeRelation - the single shared relation every node and edge lives in.
 *
 * Columns:
 * - row_id: INTEGER PRIMARY KEY AUTOINCREMENT (monotonic, never reused)
 * - pid: external identifier, unique, not null
 * - tcreated / tmodified: epoch milliseconds
 * - otype, label, description, altids (JSON list)
 * - s, p, o (JSON list of row ids), n: edge-only
 * - one column per literal field of the registered types
 */

import type Database from 'better-sqlite3';

import { ConfigError } from '../errors.js';
import type { SchemaColumn } from '../schema/typeRegistry.js';
import { SQL_COLUMN_TYPES, type SqlValue } from './fieldCodec.js';

export const NODE_TABLE = 'node';

/** Raw row as the engine returns it. */
export type RawRow = Record<string, unknown>;

export interface RowIdentity {
  row_id: number;
  pid: string;
  otype: string;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class NodeRelation {
  private readonly byPid: Database.Statement<[string], RawRow>;
  private readonly byRowId: Database.Statement<[number], RawRow>;
  private readonly identityByPid: Database.Statement<[string], RowIdentity>;
  private readonly identityByRowId: Database.Statement<[number], RowIdentity>;

  private constructor(readonly db: Database.Database) {
    this.byPid = db.prepare<[string], RawRow>(`SELECT * FROM ${NODE_TABLE} WHERE pid = ?`);
    this.byRowId = db.prepare<[number], RawRow>(`SELECT * FROM ${NODE_TABLE} WHERE row_id = ?`);
    this.identityByPid = db.prepare<[string], RowIdentity>(
      `SELECT row_id, pid, otype FROM ${NODE_TABLE} WHERE pid = ?`,
    );
    this.identityByRowId = db.prepare<[number], RowIdentity>(
      `SELECT row_id, pid, otype FROM ${NODE_TABLE} WHERE row_id = ?`,
    );
  }

  /**
   * Create the relation (if absent) with the given extension columns.
   * An existing relation must already carry every column.
   */
  static create(db: Database.Database, columns: readonly SchemaColumn[]): NodeRelation {
    const extension = columns.map(
      (column) => `${quoteIdent(column.name)} ${SQL_COLUMN_TYPES[column.type]} DEFAULT NULL`,
    );
    const ddl = [
      'row_id INTEGER PRIMARY KEY AUTOINCREMENT',
      'pid TEXT NOT NULL UNIQUE',
      'tcreated INTEGER NOT NULL',
      'tmodified INTEGER NOT NULL',
      'otype TEXT NOT NULL',
      'label TEXT DEFAULT NULL',
      'description TEXT DEFAULT NULL',
      'altids TEXT DEFAULT NULL',
      `s INTEGER DEFAULT NULL`,
      'p TEXT DEFAULT NULL',
      'o TEXT DEFAULT NULL',
      'n TEXT DEFAULT NULL',
      ...extension,
    ];
    db.exec(`CREATE TABLE IF NOT EXISTS ${NODE_TABLE} (\n  ${ddl.join(',\n  ')}\n)`);
    db.exec(`CREATE INDEX IF NOT EXISTS node_otype ON ${NODE_TABLE} (otype)`);
    db.exec(`CREATE INDEX IF NOT EXISTS edge_s ON ${NODE_TABLE} (s)`);
    db.exec(`CREATE INDEX IF NOT EXISTS edge_p ON ${NODE_TABLE} (p)`);
    db.exec(`CREATE INDEX IF NOT EXISTS edge_n ON ${NODE_TABLE} (n)`);
    return NodeRelation.attach(db, columns);
  }

  /** Bind to an existing relation without touching its schema. */
  static attach(db: Database.Database, columns: readonly SchemaColumn[]): NodeRelation {
    const present = new Set(
      db
        .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${NODE_TABLE}')`)
        .all()
        .map((row) => row.name),
    );
    const missing = columns.filter((column) => !present.has(column.name));
    if (missing.length > 0) {
      throw new ConfigError(
        `Existing relation lacks column(s) ${missing.map((c) => c.name).join(', ')}; schema migration is not supported`,
      );
    }
    return new NodeRelation(db);
  }

  rowByPid(pid: string): RawRow | undefined {
    return this.byPid.get(pid);
  }

  rowByRowId(rowId: number): RawRow | undefined {
    return this.byRowId.get(rowId);
  }

  identityOfPid(pid: string): RowIdentity | undefined {
    return this.identityByPid.get(pid);
  }

  identityOfRowId(rowId: number): RowIdentity | undefined {
    return this.identityByRowId.get(rowId);
  }

  /** Insert a row; returns its freshly assigned row id. */
  insert(values: Readonly<Record<string, SqlValue>>): number {
    const names = Object.keys(values);
    const sql = `INSERT INTO ${NODE_TABLE} (${names.map(quoteIdent).join(', ')}) VALUES (${names
      .map(() => '?')
      .join(', ')})`;
    const result = this.db.prepare<SqlValue[]>(sql).run(...names.map((name) => values[name] ?? null));
    return Number(result.lastInsertRowid);
  }

  /** Overwrite the given columns of an existing row. */
  update(rowId: number, values: Readonly<Record<string, SqlValue>>): void {
    const names = Object.keys(values);
    if (names.length === 0) return;
    const sql = `UPDATE ${NODE_TABLE} SET ${names
      .map((name) => `${quoteIdent(name)} = ?`)
      .join(', ')} WHERE row_id = ?`;
    this.db
      .prepare<SqlValue[]>(sql)
      .run(...names.map((name) => values[name] ?? null), rowId);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${NODE_TABLE}`)
      .get();
    return row?.total ?? 0;
  }
}
