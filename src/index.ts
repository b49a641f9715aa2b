/**
 * code-graphrag
 *
 * Structural extraction of JavaScript sources into a code graph, and hybrid
 * retrieval that expands vector search hits through that graph.
 */

export * from './common';
export { JavaScriptExtractor } from './parser/javascript';
export { TreeSitterEngine, createJavaScriptEngine } from './parser/parser';
export type { SyntaxEngine } from './parser/parser';
export { Scanner, walkSourceFiles } from './parser/scanner';
export type * from './parser/types';
export * from './graph';
export * from './retrieval';
export { clearIndexes, indexCodebase } from './pipeline';
export type { IndexCodebaseOptions, IndexSummary } from './pipeline';
