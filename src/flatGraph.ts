import Database from 'better-sqlite3';

import { Decomposer } from './decompose/decomposer.js';
import { ConfigError } from './errors.js';
import type { PagedQuery } from './query/pagedQuery.js';
import {
  getNodeIds,
  getRootsForPid,
  type NodeIdOptions,
  type RootOptions,
} from './query/path/reachability.js';
import {
  BreadthFirstTraversal,
  resolveWarnThreshold,
  type TraversalOptions,
} from './query/path/traversal.js';
import type { EdgePattern, EdgeRow } from './query/relationQuery.js';
import {
  buildMetadata,
  descriptorsFromMetadata,
  readMetadata,
  writeMetadata,
} from './schema/metadata.js';
import { TypeRegistry } from './schema/typeRegistry.js';
import { IdentityTranslator } from './storage/dictionary.js';
import { EdgeStore, type AddEdgeOptions } from './storage/edgeStore.js';
import { NodeRelation } from './storage/relation.js';
import { assertFlatGraphOpenOptions, type FlatGraphOpenOptions } from './types/openOptions.js';
import type { NodeInput, TypeDescriptor } from './types/schema.js';
import type {
  EdgeValue,
  IdEntry,
  NodeValue,
  OtypeCount,
  PredicateCount,
  RelationTriple,
} from './types/values.js';
import { acquireLock, type LockHandle } from './utils/lock.js';
import { createLogger, type Logger } from './utils/logger.js';

export const MEMORY_STORE = ':memory:';

const DEFAULT_IDENTITY_CACHE_SIZE = 10000;
const DEFAULT_PAGE_SIZE = 1000;

export interface AddNodeOptions {
  namedGraph?: string | null;
}

export interface RelationOptions {
  namedGraph?: string;
  maxrows?: number;
}

export interface IdOptions {
  otype?: string;
  maxrows?: number;
}

interface Attached {
  relation: NodeRelation;
  translator: IdentityTranslator;
  store: EdgeStore;
  decomposer: Decomposer;
}

/**
 * FlatGraph - a property graph kept in one relation of an embedded SQLite store.
 *
 * @example
 * ```typescript
 * const graph = await FlatGraph.open('/path/to/graph.sqlite');
 * graph.initialize([
 *   { name: 'Agent', fields: [{ name: 'affiliation', type: 'string' }] },
 *   { name: 'Person', fields: [{ name: 'knows', type: 'reference', target: 'Agent' }] },
 * ]);
 *
 * const alice = graph.addNode({ otype: 'Person', pid: 'alice', knows: { otype: 'Agent', pid: 'bob' } });
 * const triples = graph.getRelations(alice).all();
 * await graph.close();
 * ```
 */
export class FlatGraph {
  readonly registry = new TypeRegistry();
  private attached?: Attached;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    readonly path: string,
    private readonly options: FlatGraphOpenOptions,
    private readonly lock: LockHandle | undefined,
    private readonly logger: Logger,
  ) {}

  /**
   * Open or create a graph store. A store that already carries metadata is
   * reattached: its types are registered and finalized from the metadata.
   */
  static async open(path: string = MEMORY_STORE, options: FlatGraphOpenOptions = {}): Promise<FlatGraph> {
    assertFlatGraphOpenOptions(options);
    const inMemory = path === MEMORY_STORE || path === '';
    const readonly = options.readonly ?? false;
    const lock = options.enableLock && !inMemory && !readonly ? await acquireLock(path) : undefined;
    const logger = createLogger('graph', options.debug ?? false);

    let db: Database.Database | undefined;
    try {
      db = new Database(path, { readonly, fileMustExist: readonly });
      if (!inMemory && !readonly) db.pragma('journal_mode = WAL');
      const graph = new FlatGraph(db, path, options, lock, logger);
      graph.reattach();
      return graph;
    } catch (error) {
      db?.close();
      await lock?.release();
      throw error;
    }
  }

  private reattach(): void {
    const metadata = readMetadata(this.db);
    if (!metadata) return;
    this.registry.finalize(descriptorsFromMetadata(metadata));
    this.attach(NodeRelation.attach(this.db, this.registry.columns()));
    this.logger.debug(`reattached ${this.path} with types ${this.registry.typeNames().join(', ')}`);
  }

  private attach(relation: NodeRelation): void {
    const translator = new IdentityTranslator(
      relation,
      this.options.identityCacheSize ?? DEFAULT_IDENTITY_CACHE_SIZE,
    );
    const store = new EdgeStore(this.db, relation, translator, this.registry, {
      pageSize: this.options.pageSize ?? DEFAULT_PAGE_SIZE,
      now: this.options.now ?? Date.now,
      logger: this.logger,
    });
    const decomposer = new Decomposer(this.registry, store, {
      maxDepth: this.options.maxDecompositionDepth,
      logger: this.logger,
    });
    this.attached = { relation, translator, store, decomposer };
  }

  private get ready(): Attached {
    if (this.closed) throw new ConfigError('Graph is closed');
    if (!this.attached) {
      throw new ConfigError('Graph is not initialized; call initialize() first');
    }
    return this.attached;
  }

  private assertWritable(): void {
    if (this.options.readonly) throw new ConfigError('Graph is read-only');
  }

  get isInitialized(): boolean {
    return this.attached !== undefined;
  }

  // ===================
  // Schema
  // ===================

  registerType(descriptor: TypeDescriptor): void {
    this.registry.registerType(descriptor);
  }

  /**
   * Finalize the schema and create the shared relation. Calling it again with
   * the same types (or none) is a no-op.
   */
  initialize(descriptors: readonly TypeDescriptor[] = []): void {
    if (!this.attached) this.assertWritable();
    const wasFinalized = this.registry.isFinalized;
    this.registry.finalize(descriptors);
    if (wasFinalized && this.attached) return;
    const relation = this.db.transaction(() => {
      const created = NodeRelation.create(this.db, this.registry.columns());
      writeMetadata(this.db, buildMetadata(this.registry));
      return created;
    })();
    this.attach(relation);
    this.logger.debug(`initialized with types ${this.registry.typeNames().join(', ')}`);
  }

  // ===================
  // Writes
  // ===================

  /**
   * Run `fn` in one write transaction; nested calls become savepoints.
   * A rollback drops the cached pid ↔ row id pairs.
   */
  transaction<T>(fn: () => T): T {
    this.assertWritable();
    const run = this.db.transaction(fn);
    try {
      return run();
    } catch (error) {
      this.attached?.translator.clear();
      throw error;
    }
  }

  /** Decompose a composite input into nodes and edges. Returns the root pid. */
  addNode(input: NodeInput, options: AddNodeOptions = {}): string {
    const { decomposer } = this.ready;
    return this.transaction(() => decomposer.addNode(input, options.namedGraph));
  }

  addEdge(
    subjectPid: string,
    predicate: string,
    objectPids: readonly string[],
    namedGraph?: string | null,
    options: AddEdgeOptions = {},
  ): string {
    const { store } = this.ready;
    return this.transaction(() =>
      store.addEdge(subjectPid, predicate, objectPids, namedGraph, options),
    );
  }

  // ===================
  // Reads
  // ===================

  getNode(pid: string, expandDepth = 0): NodeValue | undefined {
    return this.ready.store.getNode(pid, expandDepth);
  }

  getEdge(pid: string): EdgeValue | undefined {
    return this.ready.store.getEdge(pid);
  }

  getOtype(pid: string): string | undefined {
    return this.ready.store.getOtype(pid);
  }

  getEdges(pattern: EdgePattern = {}, maxrows?: number): PagedQuery<EdgeRow, EdgeValue> {
    return this.ready.store.getEdges(pattern, maxrows);
  }

  /** Lazy triples matching the pattern; omitted positions match anything. */
  getRelations(
    subject?: string,
    predicate?: string,
    object?: string,
    options: RelationOptions = {},
  ): PagedQuery<RelationTriple, RelationTriple> {
    return this.ready.store.getRelations(
      { subject, predicate, object, namedGraph: options.namedGraph },
      options.maxrows,
    );
  }

  getIds(options: IdOptions = {}): PagedQuery<IdEntry, IdEntry> {
    return this.ready.store.getIds(options.otype, options.maxrows);
  }

  objectCounts(): OtypeCount[] {
    return this.ready.store.objectCounts();
  }

  predicateCounts(): PredicateCount[] {
    return this.ready.store.predicateCounts();
  }

  // ===================
  // Traversal
  // ===================

  breadthFirstTraversal(startPid: string, options: TraversalOptions = {}): BreadthFirstTraversal {
    const { translator } = this.ready;
    return new BreadthFirstTraversal(
      this.db,
      translator,
      startPid,
      {
        maxDepth: options.maxDepth ?? this.options.traversal?.maxDepth,
        predicates: options.predicates,
      },
      resolveWarnThreshold(this.options.traversal?.warnThreshold),
      this.logger,
    );
  }

  getRootsForPid(pid: string, options: RootOptions = {}): string[] {
    return getRootsForPid(this.db, this.ready.translator, pid, options);
  }

  getNodeIds(pid: string, options: NodeIdOptions = {}): Set<string> {
    return getNodeIds(this.db, this.ready.translator, pid, options);
  }

  // ===================
  // Identity
  // ===================

  pidToRowId(pid: string): number | undefined {
    return this.ready.translator.pidToRowId(pid);
  }

  rowIdToPid(rowId: number): string | undefined {
    return this.ready.translator.rowIdToPid(rowId);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
    await this.lock?.release();
  }
}
