import type { FieldValue } from './schema.js';

/** Property bag returned by `getNode`. Row ids never appear here. */
export interface NodeValue {
  pid: string;
  otype: string;
  tcreated: number;
  tmodified: number;
  label: string | null;
  description: string | null;
  altids: string[] | null;
  [field: string]: FieldValue | NodeValue | NodeValue[] | string[] | null;
}

/** An edge row with subject and objects translated back to pids. */
export interface EdgeValue {
  pid: string;
  otype: string;
  tcreated: number;
  tmodified: number;
  label: string | null;
  description: string | null;
  altids: string[] | null;
  s: string;
  p: string;
  o: string[];
  n: string | null;
}

/** One subject-predicate-object triple; an edge with k objects fans out into k of these. */
export interface RelationTriple {
  subject: string;
  predicate: string;
  object: string;
}

export interface TraversalStep extends RelationTriple {
  /** hop count from the start node; edges leaving it have depth 1 */
  depth: number;
}

export interface IdEntry {
  pid: string;
  otype: string;
}

export interface OtypeCount {
  otype: string;
  count: number;
}

export interface PredicateCount {
  predicate: string;
  count: number;
}
