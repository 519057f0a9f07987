/**
 * EdgeStore - row-level reads and writes of the shared relation.
 *
 * Writes take pids at the boundary and store row ids; reads translate row
 * ids back so callers only ever see pids.
 */

import type Database from 'better-sqlite3';

import { ReferentialIntegrityError, ValidationError } from '../errors.js';
import { computeEdgePid } from '../identity/edgePid.js';
import type { PagedQuery } from '../query/pagedQuery.js';
import {
  edgeRowQuery,
  idQuery,
  relationQuery,
  type EdgePattern,
  type EdgeRow,
  type RelationPattern,
} from '../query/relationQuery.js';
import type { TypeRegistry } from '../schema/typeRegistry.js';
import { EDGE_OTYPE, RESERVED_FIELDS } from '../types/schema.js';
import type {
  EdgeValue,
  IdEntry,
  NodeValue,
  OtypeCount,
  PredicateCount,
  RelationTriple,
} from '../types/values.js';
import type { Logger } from '../utils/logger.js';
import type { IdentityTranslator } from './dictionary.js';
import {
  decodeField,
  decodeRowIdList,
  decodeStringList,
  encodeField,
  encodeStringList,
  type SqlValue,
} from './fieldCodec.js';
import { NODE_TABLE, type NodeRelation, type RawRow } from './relation.js';

/** Descriptive columns any row may carry. */
export interface RowExtras {
  label?: string | null;
  description?: string | null;
  altids?: string[] | null;
}

export interface AddEdgeOptions extends RowExtras {
  /** explicit edge pid; defaults to the content-derived one */
  pid?: string;
}

const RESERVED = new Set<string>(RESERVED_FIELDS);

export interface EdgeStoreOptions {
  pageSize: number;
  now: () => number;
  logger: Logger;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

function nullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : text(value);
}

function integer(value: unknown): number {
  return typeof value === 'number' ? value : Number(value);
}

export function encodeRowExtras(extras: RowExtras): Record<string, SqlValue> {
  const values: Record<string, SqlValue> = {};
  if (extras.label !== undefined) values.label = encodeField('string', 'label', extras.label);
  if (extras.description !== undefined) {
    values.description = encodeField('string', 'description', extras.description);
  }
  if (extras.altids !== undefined) values.altids = encodeStringList('altids', extras.altids);
  return values;
}

export class EdgeStore {
  private readonly outgoing: Database.Statement<[string, number], { p: string; o: string }>;
  private readonly byOtype: Database.Statement<[], OtypeCount>;
  private readonly byPredicate: Database.Statement<[string], PredicateCount>;

  constructor(
    private readonly db: Database.Database,
    private readonly relation: NodeRelation,
    private readonly translator: IdentityTranslator,
    private readonly registry: TypeRegistry,
    private readonly options: EdgeStoreOptions,
  ) {
    this.outgoing = db.prepare<[string, number], { p: string; o: string }>(
      `SELECT p, o FROM ${NODE_TABLE} WHERE otype = ? AND s = ? ORDER BY row_id`,
    );
    this.byOtype = db.prepare<[], OtypeCount>(
      `SELECT otype, COUNT(*) AS count FROM ${NODE_TABLE} GROUP BY otype ORDER BY otype`,
    );
    this.byPredicate = db.prepare<[string], PredicateCount>(
      `SELECT p AS predicate, COUNT(*) AS count FROM ${NODE_TABLE}
        WHERE otype = ? GROUP BY p ORDER BY p`,
    );
  }

  // --- writes ---

  /**
   * Insert or update the row named by `pid`. An existing row keeps its row id
   * and `tcreated`; only the given columns change.
   */
  writeRow(otype: string, pid: string, values: Readonly<Record<string, SqlValue>>): number {
    if (typeof pid !== 'string' || pid.length === 0) {
      throw new ValidationError('pid must be a non-empty string');
    }
    const now = this.options.now();
    const existing = this.relation.identityOfPid(pid);
    if (existing) {
      if (existing.otype !== otype) {
        throw new ValidationError(
          `Row ${pid} has otype ${existing.otype}; it cannot be rewritten as ${otype}`,
        );
      }
      this.relation.update(existing.row_id, { ...values, tmodified: now });
      this.translator.remember(existing);
      return existing.row_id;
    }
    const rowId = this.relation.insert({
      ...values,
      pid,
      otype,
      tcreated: now,
      tmodified: now,
    });
    this.translator.remember({ row_id: rowId, pid, otype });
    this.options.logger.debug(`created ${otype} ${pid} as row ${rowId}`);
    return rowId;
  }

  /** Write an edge whose endpoints are already resolved. */
  writeEdge(
    pid: string,
    subjectRowId: number,
    predicate: string,
    objectRowIds: readonly number[],
    namedGraph: string | null | undefined,
    extras: RowExtras = {},
  ): number {
    return this.writeRow(EDGE_OTYPE, pid, {
      ...encodeRowExtras(extras),
      s: subjectRowId,
      p: predicate,
      o: JSON.stringify(objectRowIds),
      n: namedGraph ?? null,
    });
  }

  /**
   * Create or refresh the edge `subject -predicate-> objects`.
   *
   * Every pid must resolve; otherwise nothing is written and the unresolved
   * pids are reported in `ReferentialIntegrityError.missing`.
   */
  addEdge(
    subjectPid: string,
    predicate: string,
    objectPids: readonly string[],
    namedGraph?: string | null,
    options: AddEdgeOptions = {},
  ): string {
    if (typeof predicate !== 'string' || predicate.length === 0) {
      throw new ValidationError('Edge predicate must be a non-empty string');
    }
    if (objectPids.length === 0) {
      throw new ValidationError('Edge must have at least one object');
    }
    const objects = this.translator.resolveAll(objectPids);
    const subjectRowId = this.translator.pidToRowId(subjectPid);
    const missing = subjectRowId === undefined ? [subjectPid] : [];
    for (const pid of objects.missing) {
      if (!missing.includes(pid)) missing.push(pid);
    }
    if (subjectRowId === undefined || missing.length > 0) {
      throw new ReferentialIntegrityError(missing);
    }
    this.assertPredicate(this.translator.otypeOf(subjectPid), predicate);
    const { pid: explicitPid, ...extras } = options;
    const pid = explicitPid ?? computeEdgePid(subjectPid, predicate, objectPids, namedGraph);
    this.writeEdge(pid, subjectRowId, predicate, objects.rowIds, namedGraph, extras);
    return pid;
  }

  /**
   * Expanded reads inline objects under the predicate name, so a predicate
   * may not name a reserved column or a literal field of the subject.
   */
  assertPredicate(subjectOtype: string | undefined, predicate: string): void {
    if (RESERVED.has(predicate)) {
      throw new ValidationError(`Edge predicate "${predicate}" is a reserved column`);
    }
    if (subjectOtype !== undefined && this.registry.get(subjectOtype)?.literals.has(predicate)) {
      throw new ValidationError(`Edge predicate "${predicate}" is a field of ${subjectOtype}`);
    }
  }

  // --- reads ---

  getOtype(pid: string): string | undefined {
    return this.translator.otypeOf(pid);
  }

  /**
   * Property bag of a row. With `expandDepth > 0`, nodes reached through
   * outgoing edges are inlined under their predicate.
   */
  getNode(pid: string, expandDepth = 0): NodeValue | undefined {
    const row = this.relation.rowByPid(pid);
    if (!row) return undefined;
    return this.materialize(row, Math.max(0, Math.floor(expandDepth)), new Set());
  }

  getEdge(pid: string): EdgeValue | undefined {
    const row = this.relation.rowByPid(pid);
    if (!row || row.otype !== EDGE_OTYPE) return undefined;
    return this.toEdgeValue(row);
  }

  getEdges(pattern: EdgePattern = {}, maxrows?: number): PagedQuery<EdgeRow, EdgeValue> {
    return edgeRowQuery(
      this.db,
      pattern,
      { pageSize: this.options.pageSize, maxrows },
      (row) => this.toEdgeValue(row, row.subject),
    );
  }

  getRelations(
    pattern: RelationPattern = {},
    maxrows?: number,
  ): PagedQuery<RelationTriple, RelationTriple> {
    return relationQuery(this.db, pattern, { pageSize: this.options.pageSize, maxrows });
  }

  getIds(otype?: string, maxrows?: number): PagedQuery<IdEntry, IdEntry> {
    return idQuery(this.db, otype, { pageSize: this.options.pageSize, maxrows });
  }

  objectCounts(): OtypeCount[] {
    return this.byOtype.all();
  }

  predicateCounts(): PredicateCount[] {
    return this.byPredicate.all(EDGE_OTYPE);
  }

  private pidsOf(rowIds: readonly number[]): string[] {
    return rowIds.flatMap((rowId) => {
      const pid = this.translator.rowIdToPid(rowId);
      return pid === undefined ? [] : [pid];
    });
  }

  private toEdgeValue(row: RawRow, subjectPid?: string): EdgeValue | undefined {
    const s = subjectPid ?? this.translator.rowIdToPid(integer(row.s));
    if (s === undefined) return undefined;
    return {
      pid: text(row.pid),
      otype: EDGE_OTYPE,
      tcreated: integer(row.tcreated),
      tmodified: integer(row.tmodified),
      label: nullableText(row.label),
      description: nullableText(row.description),
      altids: decodeStringList(row.altids),
      s,
      p: text(row.p),
      o: this.pidsOf(decodeRowIdList(row.o)),
      n: nullableText(row.n),
    };
  }

  private baseBag(row: RawRow): NodeValue {
    if (row.otype === EDGE_OTYPE) {
      const edge = this.toEdgeValue(row);
      if (edge) return { ...edge };
    }
    const bag: NodeValue = {
      pid: text(row.pid),
      otype: text(row.otype),
      tcreated: integer(row.tcreated),
      tmodified: integer(row.tmodified),
      label: nullableText(row.label),
      description: nullableText(row.description),
      altids: decodeStringList(row.altids),
    };
    const type = this.registry.get(bag.otype);
    if (type) {
      for (const field of type.literals.values()) {
        bag[field.name] = decodeField(field.type, row[field.name]);
      }
    }
    return bag;
  }

  private materialize(row: RawRow, depth: number, path: Set<number>): NodeValue {
    const bag = this.baseBag(row);
    if (depth === 0) return bag;

    const rowId = integer(row.row_id);
    path.add(rowId);
    const grouped = new Map<string, { values: NodeValue[]; list: boolean }>();
    for (const edge of this.outgoing.all(EDGE_OTYPE, rowId)) {
      const objectRowIds = decodeRowIdList(edge.o);
      const previous = grouped.get(edge.p);
      const entry = previous ?? { values: [], list: false };
      if (previous || objectRowIds.length > 1) entry.list = true;
      grouped.set(edge.p, entry);
      for (const objectRowId of objectRowIds) {
        const child = this.relation.rowByRowId(objectRowId);
        if (!child) continue;
        // a node already on the path is inlined without its own edges
        entry.values.push(
          path.has(objectRowId) ? this.baseBag(child) : this.materialize(child, depth - 1, path),
        );
      }
    }
    path.delete(rowId);

    const type = this.registry.get(bag.otype);
    for (const [predicate, entry] of grouped) {
      if (predicate in bag) {
        this.options.logger.debug(`predicate ${predicate} shadows a column of ${bag.pid}; not inlined`);
        continue;
      }
      const many = type?.references.get(predicate)?.many === true;
      bag[predicate] = many || entry.list ? entry.values : (entry.values[0] ?? null);
    }
    return bag;
  }
}
