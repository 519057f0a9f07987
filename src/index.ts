// =======================
// Core
// =======================

export { FlatGraph, MEMORY_STORE } from './flatGraph.js';
export type { AddNodeOptions, IdOptions, RelationOptions } from './flatGraph.js';
export type { AddEdgeOptions, RowExtras } from './storage/edgeStore.js';

// Errors
export {
  FlatGraphError,
  ConfigError,
  ReferentialIntegrityError,
  StructuralError,
  ValidationError,
} from './errors.js';
export type { FlatGraphErrorCode } from './errors.js';

// Schema
export { TypeRegistry } from './schema/typeRegistry.js';
export type { RegisteredType, SchemaColumn } from './schema/typeRegistry.js';
export { METADATA_TABLE, readMetadata } from './schema/metadata.js';
export type { GraphMetadata } from './schema/metadata.js';
export {
  EDGE_OTYPE,
  EDGE_FIELDS,
  LITERAL_FIELD_TYPES,
  RESERVED_FIELDS,
  isNodeInput,
} from './types/schema.js';
export type {
  FieldDeclaration,
  FieldValue,
  LiteralFieldDeclaration,
  LiteralFieldType,
  NodeInput,
  NodeOf,
  ReferenceFieldDeclaration,
  TypeDescriptor,
} from './types/schema.js';
export type {
  EdgeValue,
  IdEntry,
  NodeValue,
  OtypeCount,
  PredicateCount,
  RelationTriple,
  TraversalStep,
} from './types/values.js';

// Identity
export { ANONYMOUS_PREFIX, canonicalEdgeKey, computeEdgePid } from './identity/edgePid.js';

// Queries
export { PagedQuery } from './query/pagedQuery.js';
export { BreadthFirstTraversal } from './query/path/traversal.js';
export type { TraversalOptions } from './query/path/traversal.js';
export type { NodeIdOptions, RootOptions } from './query/path/reachability.js';
export type { EdgePattern, RelationPattern } from './query/relationQuery.js';

// Options
export { isFlatGraphOpenOptions, assertFlatGraphOpenOptions } from './types/openOptions.js';
export type { FlatGraphOpenOptions } from './types/openOptions.js';

// =======================
// Extensions
// =======================

export * as Extensions from './extensions/index.js';
export {
  EdgeTypeCatalog,
  TypedEdgeQueries,
  TypedEdgeWriter,
} from './extensions/typedEdges/index.js';
export type { EdgeType, EdgeTypeRule } from './extensions/typedEdges/index.js';
