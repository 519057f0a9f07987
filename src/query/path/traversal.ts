import type Database from 'better-sqlite3';

import type { IdentityTranslator } from '../../storage/dictionary.js';
import type { SqlValue } from '../../storage/fieldCodec.js';
import { NODE_TABLE } from '../../storage/relation.js';
import { EDGE_OTYPE } from '../../types/schema.js';
import type { TraversalStep } from '../../types/values.js';
import type { Logger } from '../../utils/logger.js';

export interface TraversalOptions {
  /** hop limit; edges leaving the start node are hop 1 */
  maxDepth?: number;
  /** follow only edges with one of these predicates */
  predicates?: readonly string[];
}

export const DEFAULT_WARN_THRESHOLD = 10000;

// FLATGRAPH_TRAVERSAL_WARN_THRESHOLD=number; 0 turns the warning off
export function resolveWarnThreshold(configured?: number): number {
  if (configured !== undefined) return configured;
  const raw = typeof process !== 'undefined' ? process.env.FLATGRAPH_TRAVERSAL_WARN_THRESHOLD : '';
  if (raw === undefined || raw.trim() === '') return DEFAULT_WARN_THRESHOLD;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) return DEFAULT_WARN_THRESHOLD;
  return n;
}

interface OutgoingRow {
  edge: number;
  position: number;
  predicate: string;
  objectRow: number;
  object: string;
}

interface Frontier {
  rowId: number;
  pid: string;
  depth: number;
}

/**
 * Breadth-first walk over outgoing edges.
 *
 * Lazy and restartable: each iteration starts again from `startPid`. Visited
 * nodes are expanded once and every (edge, object) pair is yielded once, so
 * cycles terminate.
 */
export class BreadthFirstTraversal implements Iterable<TraversalStep> {
  private readonly outgoing: Database.Statement<SqlValue[], OutgoingRow>;
  private readonly predicates: readonly string[];

  constructor(
    db: Database.Database,
    private readonly translator: IdentityTranslator,
    private readonly startPid: string,
    private readonly options: TraversalOptions,
    private readonly warnThreshold: number,
    private readonly logger: Logger,
  ) {
    this.predicates = options.predicates ?? [];
    const filter =
      this.predicates.length > 0 ? `AND e.p IN (${this.predicates.map(() => '?').join(', ')})` : '';
    this.outgoing = db.prepare<SqlValue[], OutgoingRow>(
      `SELECT e.row_id AS edge, j.key AS position, e.p AS predicate,
              j.value AS objectRow, obj.pid AS object
         FROM ${NODE_TABLE} e
         JOIN json_each(e.o) j
         JOIN ${NODE_TABLE} obj ON obj.row_id = j.value
        WHERE e.otype = ? AND e.s = ? ${filter}
        ORDER BY e.row_id, j.key`,
    );
  }

  *[Symbol.iterator](): IterableIterator<TraversalStep> {
    const start = this.translator.pidToRowId(this.startPid);
    if (start === undefined) return;
    const maxDepth = this.options.maxDepth;

    const visitedNodes = new Set<number>([start]);
    const visitedEdges = new Set<string>();
    const queue: Frontier[] = [{ rowId: start, pid: this.startPid, depth: 0 }];
    let head = 0;
    let yielded = 0;

    while (head < queue.length) {
      const current = queue[head];
      head += 1;
      if (!current) break;
      if (maxDepth !== undefined && current.depth >= maxDepth) continue;

      const rows = this.outgoing.all(EDGE_OTYPE, current.rowId, ...this.predicates);
      for (const row of rows) {
        const key = `${row.edge}:${row.position}`;
        if (visitedEdges.has(key)) continue;
        visitedEdges.add(key);

        const depth = current.depth + 1;
        yield { subject: current.pid, predicate: row.predicate, object: row.object, depth };
        yielded += 1;
        if (this.warnThreshold > 0 && yielded === this.warnThreshold) {
          this.logger.warn(
            `traversal from ${this.startPid} has yielded ${yielded} steps; consider maxDepth or a predicate filter`,
          );
        }

        if (!visitedNodes.has(row.objectRow)) {
          visitedNodes.add(row.objectRow);
          queue.push({ rowId: row.objectRow, pid: row.object, depth });
        }
      }
    }
  }

  all(): TraversalStep[] {
    return [...this];
  }
}
