export { HybridRetriever, compareResults } from './hybrid';
export type { RetrievalDefaults } from './hybrid';
export { OpenAIEmbeddingProvider } from './embeddings';
export type { OpenAIEmbeddingOptions } from './embeddings';
export { LanceVectorStore, DEFAULT_VECTOR_TABLE } from './vector-store';
export type { LanceVectorStoreOptions } from './vector-store';
export { buildSnippets, DEFAULT_MIN_FUNCTION_LENGTH } from './snippets';
export * from './types';
