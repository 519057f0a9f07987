export {
  EdgeTypeCatalog,
  edgeTypeKey,
  formatEdgeType,
  isEdgeTypeRule,
  type EdgeType,
  type EdgeTypeCheck,
  type EdgeTypeRule,
} from './catalog.js';
export {
  TypedEdgeQueries,
  TypedEdgeWriter,
  type EdgeTypeCount,
  type TypedEdge,
  type TypedEdgeOptions,
  type TypedRelation,
  type TypedRelationFilter,
} from './queries.js';
