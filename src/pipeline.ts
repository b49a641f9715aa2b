/**
 * Indexing pipeline: scan -> graph build -> snippets -> vector store.
 */

import { createLogger, errorMessage } from './common/logger';
import type { BuildReport, GraphBuilder } from './graph/builder';
import type { GraphStore } from './graph/types';
import type { Scanner } from './parser/scanner';
import type { ExtractionFailure } from './parser/types';
import { buildSnippets, DEFAULT_MIN_FUNCTION_LENGTH } from './retrieval/snippets';
import type { LanceVectorStore } from './retrieval/vector-store';

const log = createLogger('pipeline');

export interface IndexCodebaseOptions {
    root: string;
    scanner: Scanner;
    builder: GraphBuilder;
    /** Omitted: snippets are counted but not embedded */
    vectorStore?: LanceVectorStore;
    minFunctionLength?: number;
}

export interface IndexSummary {
    files: number;
    functions: number;
    failures: ExtractionFailure[];
    build: BuildReport;
    snippets: number;
    indexed: number;
    warnings: string[];
}

export async function indexCodebase(options: IndexCodebaseOptions): Promise<IndexSummary> {
    const warnings: string[] = [];

    const { files, failures } = await options.scanner.extractDirectory(options.root);
    const functions = files.reduce((sum, file) => sum + file.functions.size, 0);
    log.info('Extraction finished', { files: files.length, functions, failures: failures.length });

    const build = await options.builder.build(files);
    if (build.skipped) {
        warnings.push('graph store not connected, graph build skipped');
    }
    for (const failure of build.failed) {
        warnings.push(`graph batch for ${failure.file} failed: ${failure.reason}`);
    }

    const snippets = buildSnippets(files, options.minFunctionLength ?? DEFAULT_MIN_FUNCTION_LENGTH);
    let indexed = 0;
    if (options.vectorStore) {
        try {
            indexed = await options.vectorStore.index(snippets);
        } catch (error) {
            warnings.push(`vector indexing failed: ${errorMessage(error)}`);
            log.warn('Vector indexing failed', { error: errorMessage(error) });
        }
    }

    return { files: files.length, functions, failures, build, snippets: snippets.length, indexed, warnings };
}

/**
 * Empty the graph (when connected) and drop the vector table, for a
 * rebuild from scratch.
 */
export async function clearIndexes(store: GraphStore, vectorStore?: LanceVectorStore): Promise<void> {
    if (store.isReady()) {
        await store.clear();
        log.info('Graph cleared');
    }
    await vectorStore?.drop();
}
