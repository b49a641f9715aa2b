import type { FunctionKind } from '../parser/types';

/**
 * Text indexed for one function. `id` equals the Function node key.
 */
export interface Snippet {
    id: string;
    text: string;
}

export interface VectorMatch {
    id: string;
    score: number;
}

export interface VectorSearch {
    search(query: string, topK: number): Promise<VectorMatch[]>;
}

export interface EmbeddingProvider {
    readonly model: string;
    /** One vector per input text, in input order */
    embed(texts: readonly string[]): Promise<number[][]>;
}

export type Relation = 'vector_match' | 'call_graph' | 'same_file' | 'shared_dependency';

export type ResultSource = 'vector_search' | 'graph_traversal' | 'vector_search + graph_traversal';

export interface RetrievedNode {
    id: string;
    kind: 'function' | 'file';
    name?: string;
    filePath: string;
    startLine: number;
    endLine?: number;
    functionKind?: FunctionKind;
    code?: string;
    /** Similarity score, vector hits only */
    score?: number;
    /** Fewest CALLS hops from any seed */
    hops?: number;
    source: ResultSource;
    relations: Relation[];
}

export interface RetrieveOptions {
    topK?: number;
    maxHops?: number;
}

export interface RetrievalResult {
    results: RetrievedNode[];
    warnings: string[];
}
