/**
 * Code graph: schema, builder and stores.
 */

export { GraphBuilder, buildCorpusIndex } from './builder';
export type { BuildReport } from './builder';
export { LocalImportResolver, CallTargetResolver } from './resolution';
export type { CorpusIndex, CallScope } from './resolution';
export { NodeLabel, EdgeType, EDGE_SCHEMA, MAX_TRAVERSAL_HOPS } from './schema';
export { InMemoryGraphStore } from './store/memory';
export { Neo4jGraphStore } from './store/neo4j';
export type { Neo4jStoreOptions, TraversalMode } from './store/neo4j';
export * from './types';
export { functionKey, externalKey, parseFunctionKey, normalizePath } from './utils';
