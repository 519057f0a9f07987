/**
 * Decomposer - flattens a composite node input into node rows and edges.
 *
 * Planning walks the input with an explicit stack. Objects are tracked by
 * identity, so a shared or cyclic sub-object is planned once. Writing then
 * stores every planned node before any edge.
 */

import { StructuralError, ValidationError } from '../errors.js';
import { computeEdgePid, generateAnonymousPid } from '../identity/edgePid.js';
import type { TypeRegistry } from '../schema/typeRegistry.js';
import { encodeRowExtras, type EdgeStore } from '../storage/edgeStore.js';
import { encodeField, type SqlValue } from '../storage/fieldCodec.js';
import { RESERVED_FIELDS, isNodeInput, type NodeInput } from '../types/schema.js';
import type { Logger } from '../utils/logger.js';

const INPUT_KEYS = new Set(['otype', 'pid', 'label', 'description', 'altids']);
const RESERVED = new Set<string>(RESERVED_FIELDS);

export interface PlannedNode {
  readonly input: NodeInput;
  readonly pid: string;
  readonly otype: string;
  readonly depth: number;
  readonly values: Record<string, SqlValue>;
}

export interface PlannedEdge {
  readonly subject: PlannedNode;
  readonly predicate: string;
  readonly objects: readonly PlannedNode[];
}

export interface DecompositionPlan {
  readonly root: PlannedNode;
  /** admission order, root first */
  readonly nodes: readonly PlannedNode[];
  readonly edges: readonly PlannedEdge[];
}

export interface DecomposerOptions {
  /** deepest nesting accepted; unbounded when absent */
  maxDepth?: number;
  logger: Logger;
}

export class Decomposer {
  constructor(
    private readonly registry: TypeRegistry,
    private readonly store: EdgeStore,
    private readonly options: DecomposerOptions,
  ) {}

  /** Plan without touching storage. */
  plan(input: NodeInput): DecompositionPlan {
    if (!isNodeInput(input)) {
      throw new ValidationError('Node input must be an object with a string otype');
    }
    const arena = new Map<NodeInput, PlannedNode>();
    const byPid = new Map<string, PlannedNode>();
    const nodes: PlannedNode[] = [];
    const edges: PlannedEdge[] = [];
    const stack: PlannedNode[] = [];

    const admit = (candidate: NodeInput, depth: number): PlannedNode => {
      const known = arena.get(candidate);
      if (known) return known;
      const { maxDepth } = this.options;
      if (maxDepth !== undefined && depth > maxDepth) {
        throw new StructuralError(`Nesting exceeds ${maxDepth} levels at otype ${candidate.otype}`);
      }
      this.registry.require(candidate.otype);
      if (candidate.pid !== undefined && (typeof candidate.pid !== 'string' || candidate.pid === '')) {
        throw new ValidationError('pid must be a non-empty string');
      }
      const pid = candidate.pid ?? generateAnonymousPid();
      const claimed = byPid.get(pid);
      if (claimed && claimed.otype !== candidate.otype) {
        throw new StructuralError(
          `pid ${pid} is claimed as both ${claimed.otype} and ${candidate.otype}`,
        );
      }
      const planned: PlannedNode = {
        input: candidate,
        pid,
        otype: candidate.otype,
        depth,
        values: encodeRowExtras(candidate),
      };
      arena.set(candidate, planned);
      if (!claimed) byPid.set(pid, planned);
      nodes.push(planned);
      stack.push(planned);
      return planned;
    };

    const root = admit(input, 0);
    let current = stack.pop();
    while (current) {
      this.expand(current, admit, edges);
      current = stack.pop();
    }
    return { root, nodes, edges };
  }

  private expand(
    node: PlannedNode,
    admit: (candidate: NodeInput, depth: number) => PlannedNode,
    edges: PlannedEdge[],
  ): void {
    const type = this.registry.require(node.otype);
    for (const [field, value] of Object.entries(node.input)) {
      if (INPUT_KEYS.has(field) || value === undefined) continue;
      if (RESERVED.has(field)) {
        throw new ValidationError(`${node.otype}: "${field}" is a reserved column`);
      }
      const literal = type.literals.get(field);
      if (literal) {
        node.values[field] = encodeField(literal.type, field, value);
        continue;
      }

      const reference = type.references.get(field);
      if (value === null) {
        if (reference) continue;
        throw new ValidationError(`${node.otype} has no field "${field}"`);
      }
      const items: unknown[] = Array.isArray(value) ? value : [value];
      if (items.length === 0) continue;
      const nested = items.filter(isNodeInput);
      if (nested.length !== items.length) {
        if (!reference && nested.length === 0) {
          throw new ValidationError(`${node.otype} has no field "${field}"`);
        }
        throw new ValidationError(
          `${node.otype}.${field} must hold node inputs only, not a mix with other values`,
        );
      }
      const target = reference?.target;
      if (target !== undefined) {
        const wrong = nested.find((item) => item.otype !== target);
        if (wrong) {
          throw new ValidationError(
            `${node.otype}.${field} references ${target}, got ${wrong.otype}`,
          );
        }
      }
      if (!reference) {
        this.options.logger.debug(`${node.otype}.${field} is undeclared; stored as a reference`);
      }
      this.store.assertPredicate(node.otype, field);
      const objects = nested.map((item) => admit(item, node.depth + 1));
      edges.push({ subject: node, predicate: field, objects });
    }
  }

  /**
   * Write a plan: nodes first, then edges. Returns the root pid.
   * Callers run this inside a transaction.
   */
  write(plan: DecompositionPlan, namedGraph?: string | null): string {
    const rowIds = new Map<PlannedNode, number>();
    for (const node of plan.nodes) {
      rowIds.set(node, this.store.writeRow(node.otype, node.pid, node.values));
    }
    for (const edge of plan.edges) {
      const subjectRowId = rowIds.get(edge.subject);
      if (subjectRowId === undefined) {
        throw new StructuralError(`Edge ${edge.predicate} has an unplanned subject`);
      }
      const objectRowIds = edge.objects.map((object) => {
        const rowId = rowIds.get(object);
        if (rowId === undefined) {
          throw new StructuralError(`Edge ${edge.predicate} has an unplanned object`);
        }
        return rowId;
      });
      const objectPids = edge.objects.map((object) => object.pid);
      const pid = computeEdgePid(edge.subject.pid, edge.predicate, objectPids, namedGraph);
      this.store.writeEdge(pid, subjectRowId, edge.predicate, objectRowIds, namedGraph);
    }
    this.options.logger.debug(
      `decomposed ${plan.root.pid}: ${plan.nodes.length} node(s), ${plan.edges.length} edge(s)`,
    );
    return plan.root.pid;
  }

  addNode(input: NodeInput, namedGraph?: string | null): string {
    return this.write(this.plan(input), namedGraph);
  }
}
