/**
 * Closure queries answered by the engine with `WITH RECURSIVE`.
 * `UNION` (not `UNION ALL`) deduplicates row ids, so cycles terminate.
 */

import type Database from 'better-sqlite3';

import type { IdentityTranslator } from '../../storage/dictionary.js';
import type { SqlValue } from '../../storage/fieldCodec.js';
import { NODE_TABLE } from '../../storage/relation.js';
import { EDGE_OTYPE } from '../../types/schema.js';

export interface RootOptions {
  /** keep only referrers of this otype */
  targetType?: string;
  /** follow only edges with one of these predicates */
  predicates?: readonly string[];
}

export interface NodeIdOptions {
  /** also report the pids of the connecting edges */
  includeEdges?: boolean;
}

/**
 * Every subject that references `pid` directly or through a chain of
 * edges, in row order.
 */
export function getRootsForPid(
  db: Database.Database,
  translator: IdentityTranslator,
  pid: string,
  options: RootOptions = {},
): string[] {
  const rowId = translator.pidToRowId(pid);
  if (rowId === undefined) return [];
  const predicates = options.predicates ?? [];
  const predicateFilter =
    predicates.length > 0 ? `AND e.p IN (${predicates.map(() => '?').join(', ')})` : '';
  const params: SqlValue[] = [EDGE_OTYPE, rowId, ...predicates, EDGE_OTYPE, ...predicates];
  let typeFilter = '';
  if (options.targetType !== undefined) {
    typeFilter = 'WHERE n.otype = ?';
    params.push(options.targetType);
  }
  const rows = db
    .prepare<SqlValue[], { pid: string }>(
      `WITH RECURSIVE referrer(row_id) AS (
         SELECT e.s FROM ${NODE_TABLE} e JOIN json_each(e.o) j
          WHERE e.otype = ? AND j.value = ? ${predicateFilter}
         UNION
         SELECT e.s FROM referrer r
           JOIN ${NODE_TABLE} e ON e.otype = ? ${predicateFilter}
           JOIN json_each(e.o) j ON j.value = r.row_id
       )
       SELECT n.pid AS pid FROM referrer r
         JOIN ${NODE_TABLE} n ON n.row_id = r.row_id
       ${typeFilter}
       ORDER BY n.row_id`,
    )
    .all(...params);
  return rows.map((row) => row.pid);
}

/**
 * Pids reachable from `pid` through outgoing edges, `pid` included.
 * Empty for an unknown pid.
 */
export function getNodeIds(
  db: Database.Database,
  translator: IdentityTranslator,
  pid: string,
  options: NodeIdOptions = {},
): Set<string> {
  const rowId = translator.pidToRowId(pid);
  if (rowId === undefined) return new Set();
  const params: SqlValue[] = [rowId, EDGE_OTYPE];
  let edgeSelect = '';
  if (options.includeEdges) {
    edgeSelect = `UNION
       SELECT e.pid AS pid, e.row_id AS row_id FROM ${NODE_TABLE} e
        WHERE e.otype = ? AND e.s IN (SELECT row_id FROM reach)`;
    params.push(EDGE_OTYPE);
  }
  const rows = db
    .prepare<SqlValue[], { pid: string; row_id: number }>(
      `WITH RECURSIVE reach(row_id) AS (
         SELECT ?
         UNION
         SELECT j.value FROM reach r
           JOIN ${NODE_TABLE} e ON e.s = r.row_id AND e.otype = ?
           JOIN json_each(e.o) j
       )
       SELECT n.pid AS pid, n.row_id AS row_id FROM reach r
         JOIN ${NODE_TABLE} n ON n.row_id = r.row_id
       ${edgeSelect}
       ORDER BY row_id`,
    )
    .all(...params);
  return new Set(rows.map((row) => row.pid));
}
