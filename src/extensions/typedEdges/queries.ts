import { ReferentialIntegrityError, ValidationError } from '../../errors.js';
import type { FlatGraph } from '../../flatGraph.js';
import { EDGE_OTYPE } from '../../types/schema.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import {
  formatEdgeType,
  type EdgeType,
  type EdgeTypeCatalog,
  type EdgeTypeCheck,
} from './catalog.js';

export interface TypedEdge {
  subject: string;
  predicate: string;
  objects: string[];
  namedGraph: string | null;
  type: EdgeType;
}

export interface TypedRelation {
  subject: string;
  predicate: string;
  object: string;
  /** undefined when no rule matches */
  type: EdgeType | undefined;
}

export interface TypedRelationFilter {
  subject?: string;
  type?: EdgeType;
  object?: string;
  maxrows?: number;
}

export interface EdgeTypeCount {
  type: EdgeType;
  count: number;
}

/**
 * Queries by inferred edge type. Read-only: nothing is added to storage.
 */
export class TypedEdgeQueries {
  private readonly logger: Logger;

  constructor(
    private readonly graph: FlatGraph,
    readonly catalog: EdgeTypeCatalog,
  ) {
    this.logger = createLogger('typed-edges');
  }

  /** otype of a non-edge row */
  private nodeOtype(pid: string): string | undefined {
    const otype = this.graph.getOtype(pid);
    return otype === EDGE_OTYPE ? undefined : otype;
  }

  inferFromPids(subjectPid: string, predicate: string, objectPid: string): EdgeType | undefined {
    const subjectType = this.nodeOtype(subjectPid);
    if (subjectType === undefined) {
      this.logger.debug(`subject node not found: ${subjectPid}`);
      return undefined;
    }
    const objectType = this.nodeOtype(objectPid);
    if (objectType === undefined) {
      this.logger.debug(`object node not found: ${objectPid}`);
      return undefined;
    }
    return this.catalog.infer(subjectType, predicate, objectType);
  }

  /** Edges whose subject and every object carry the otypes of `type`. */
  *edgesByType(type: EdgeType, limit = 0): Generator<TypedEdge> {
    let produced = 0;
    for (const edge of this.graph.getEdges({ predicate: type.predicate })) {
      if (this.nodeOtype(edge.s) !== type.subjectType) continue;
      if (edge.o.length === 0) continue;
      if (!edge.o.every((object) => this.nodeOtype(object) === type.objectType)) continue;
      yield { subject: edge.s, predicate: edge.p, objects: edge.o, namedGraph: edge.n, type };
      produced += 1;
      if (limit > 0 && produced >= limit) return;
    }
  }

  /** Triples annotated with their inferred type, optionally restricted to one type. */
  *typedRelations(filter: TypedRelationFilter = {}): Generator<TypedRelation> {
    const maxrows = filter.maxrows ?? 0;
    let produced = 0;
    for (const triple of this.graph.getRelations(
      filter.subject,
      filter.type?.predicate,
      filter.object,
    )) {
      const type = this.inferFromPids(triple.subject, triple.predicate, triple.object);
      if (filter.type && type?.key !== filter.type.key) continue;
      yield { ...triple, type };
      produced += 1;
      if (maxrows > 0 && produced >= maxrows) return;
    }
  }

  *edgesBySubjectType(subjectType: string, limit = 0): Generator<TypedRelation> {
    for (const type of this.catalog.bySubject(subjectType)) {
      yield* this.fanOut(type, limit);
    }
  }

  *edgesByObjectType(objectType: string, limit = 0): Generator<TypedRelation> {
    for (const type of this.catalog.byObject(objectType)) {
      yield* this.fanOut(type, limit);
    }
  }

  private *fanOut(type: EdgeType, limit: number): Generator<TypedRelation> {
    for (const edge of this.edgesByType(type, limit)) {
      for (const object of edge.objects) {
        yield { subject: edge.subject, predicate: edge.predicate, object, type };
      }
    }
  }

  validateEdge(
    subjectPid: string,
    predicate: string,
    objectPid: string,
    expected?: EdgeType,
  ): EdgeTypeCheck {
    const subjectType = this.nodeOtype(subjectPid) ?? 'Unknown';
    const objectType = this.nodeOtype(objectPid) ?? 'Unknown';
    const inferred = this.inferFromPids(subjectPid, predicate, objectPid);
    if (!inferred) {
      return {
        valid: false,
        reason: `Edge pattern (${subjectType}, ${predicate}, ${objectType}) does not match any known edge type`,
      };
    }
    if (expected && inferred.key !== expected.key) {
      return {
        valid: false,
        reason: `Expected ${formatEdgeType(expected)}, but inferred ${formatEdgeType(inferred)}`,
      };
    }
    return { valid: true };
  }

  /** Edge count per type, most used first; unused types are left out. */
  statistics(): EdgeTypeCount[] {
    const counts: EdgeTypeCount[] = [];
    for (const type of this.catalog.list()) {
      let count = 0;
      for (const _edge of this.edgesByType(type)) count += 1;
      if (count > 0) counts.push({ type, count });
    }
    return counts.sort((a, b) => b.count - a.count);
  }
}

export interface TypedEdgeOptions {
  expected?: EdgeType;
  namedGraph?: string | null;
  /** @default true */
  validate?: boolean;
}

/**
 * Adds edges after checking every object against the catalog.
 */
export class TypedEdgeWriter {
  private readonly queries: TypedEdgeQueries;

  constructor(
    private readonly graph: FlatGraph,
    catalog: EdgeTypeCatalog,
  ) {
    this.queries = new TypedEdgeQueries(graph, catalog);
  }

  addTypedEdge(
    subjectPid: string,
    predicate: string,
    objectPids: readonly string[],
    options: TypedEdgeOptions = {},
  ): string {
    if (options.validate ?? true) {
      const missing = [subjectPid, ...objectPids].filter(
        (pid, index, all) => this.graph.getOtype(pid) === undefined && all.indexOf(pid) === index,
      );
      if (missing.length > 0) throw new ReferentialIntegrityError(missing);
      for (const objectPid of objectPids) {
        const check = this.queries.validateEdge(subjectPid, predicate, objectPid, options.expected);
        if (!check.valid) throw new ValidationError(`Edge validation failed: ${check.reason}`);
      }
    }
    return this.graph.addEdge(subjectPid, predicate, objectPids, options.namedGraph);
  }
}
