import type Database from 'better-sqlite3';

import type { SqlValue } from '../storage/fieldCodec.js';
import { NODE_TABLE } from '../storage/relation.js';
import { EDGE_OTYPE } from '../types/schema.js';
import type { IdEntry, RelationTriple } from '../types/values.js';
import { PagedQuery, type PageOptions } from './pagedQuery.js';

export interface RelationPattern {
  subject?: string;
  predicate?: string;
  object?: string;
  namedGraph?: string;
}

export interface EdgePattern {
  subject?: string;
  predicate?: string;
  namedGraph?: string;
}

/** Edge row as read for `getEdges`, objects still as row ids. */
export interface EdgeRow {
  pid: string;
  subject: string;
  p: string;
  o: string;
  n: string | null;
  [column: string]: unknown;
}

/**
 * Triples matching a pattern. An edge with k objects fans out into k triples,
 * ordered by edge row then object position.
 */
export function relationQuery(
  db: Database.Database,
  pattern: RelationPattern,
  options: PageOptions,
): PagedQuery<RelationTriple, RelationTriple> {
  const where = [`e.otype = ?`];
  const params: SqlValue[] = [EDGE_OTYPE];
  if (pattern.subject !== undefined) {
    where.push('sn.pid = ?');
    params.push(pattern.subject);
  }
  if (pattern.predicate !== undefined) {
    where.push('e.p = ?');
    params.push(pattern.predicate);
  }
  if (pattern.object !== undefined) {
    where.push('obj.pid = ?');
    params.push(pattern.object);
  }
  if (pattern.namedGraph !== undefined) {
    where.push('e.n = ?');
    params.push(pattern.namedGraph);
  }
  const statement = db.prepare<SqlValue[], RelationTriple>(
    `SELECT sn.pid AS subject, e.p AS predicate, obj.pid AS object
       FROM ${NODE_TABLE} e
       JOIN ${NODE_TABLE} sn ON sn.row_id = e.s
       JOIN json_each(e.o) j
       JOIN ${NODE_TABLE} obj ON obj.row_id = j.value
      WHERE ${where.join(' AND ')}
      ORDER BY e.row_id, j.key
      LIMIT ? OFFSET ?`,
  );
  return new PagedQuery(statement, params, options, (row) => row);
}

/** Edge rows matching a pattern, subject already translated to its pid. */
export function edgeRowQuery<TOut>(
  db: Database.Database,
  pattern: EdgePattern,
  options: PageOptions,
  map: (row: EdgeRow) => TOut | undefined,
): PagedQuery<EdgeRow, TOut> {
  const where = [`e.otype = ?`];
  const params: SqlValue[] = [EDGE_OTYPE];
  if (pattern.subject !== undefined) {
    where.push('sn.pid = ?');
    params.push(pattern.subject);
  }
  if (pattern.predicate !== undefined) {
    where.push('e.p = ?');
    params.push(pattern.predicate);
  }
  if (pattern.namedGraph !== undefined) {
    where.push('e.n = ?');
    params.push(pattern.namedGraph);
  }
  const statement = db.prepare<SqlValue[], EdgeRow>(
    `SELECT e.*, sn.pid AS subject
       FROM ${NODE_TABLE} e
       JOIN ${NODE_TABLE} sn ON sn.row_id = e.s
      WHERE ${where.join(' AND ')}
      ORDER BY e.row_id
      LIMIT ? OFFSET ?`,
  );
  return new PagedQuery(statement, params, options, map);
}

export function idQuery(
  db: Database.Database,
  otype: string | undefined,
  options: PageOptions,
): PagedQuery<IdEntry, IdEntry> {
  const params: SqlValue[] = [];
  let where = '';
  if (otype !== undefined) {
    where = 'WHERE otype = ?';
    params.push(otype);
  }
  const statement = db.prepare<SqlValue[], IdEntry>(
    `SELECT pid, otype FROM ${NODE_TABLE} ${where} ORDER BY row_id LIMIT ? OFFSET ?`,
  );
  return new PagedQuery(statement, params, options, (row) => row);
}
