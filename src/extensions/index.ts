// Extensions build on the public FlatGraph API only; they add no storage.
export * from './typedEdges/index.js';
