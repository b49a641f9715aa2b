#!/usr/bin/env node
/**
 * code-graphrag CLI
 *
 * Usage:
 *   code-graphrag index [dir] [--clear] [--dry-run]
 *   code-graphrag query "<text>" [--top-k n] [--hops n]
 *   code-graphrag stats
 */

import * as path from 'path';
import { loadConfig } from './common/config';
import type { Config } from './common/config';
import { ConnectivityError, InitializationError } from './common/errors';
import { configureLogger, createLogger, errorMessage } from './common/logger';
import { GraphBuilder } from './graph/builder';
import { LocalImportResolver } from './graph/resolution';
import { MAX_TRAVERSAL_HOPS } from './graph/schema';
import { InMemoryGraphStore } from './graph/store/memory';
import { Neo4jGraphStore } from './graph/store/neo4j';
import type { GraphStore } from './graph/types';
import { JavaScriptExtractor } from './parser/javascript/extractor';
import { createJavaScriptEngine } from './parser/parser';
import { Scanner } from './parser/scanner';
import { clearIndexes, indexCodebase } from './pipeline';
import { OpenAIEmbeddingProvider } from './retrieval/embeddings';
import { HybridRetriever } from './retrieval/hybrid';
import { LanceVectorStore } from './retrieval/vector-store';

const log = createLogger('cli');

type Command = 'index' | 'query' | 'stats' | 'help';

export interface CliArgs {
    command: Command;
    /** Directory for `index`, query text for `query` */
    positional?: string;
    clear: boolean;
    dryRun: boolean;
    topK?: number;
    hops?: number;
}

export class UsageError extends Error {}

function parsePositiveInt(flag: string, value: string | undefined, max?: number): number {
    const parsed = value === undefined ? NaN : Number(value);
    if (!Number.isInteger(parsed) || parsed < 1 || (max !== undefined && parsed > max)) {
        const range = max !== undefined ? ` between 1 and ${max}` : '';
        throw new UsageError(`${flag} expects a positive integer${range}, got ${value ?? 'nothing'}`);
    }
    return parsed;
}

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseArgs(args: readonly string[]): CliArgs {
    const result: CliArgs = { command: 'help', clear: false, dryRun: false };
    let commandSeen = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        switch (arg) {
            case '--clear':
                result.clear = true;
                break;

            case '--dry-run':
                result.dryRun = true;
                break;

            case '--top-k':
            case '-k':
                result.topK = parsePositiveInt(arg, args[++i]);
                break;

            case '--hops':
                result.hops = parsePositiveInt(arg, args[++i], MAX_TRAVERSAL_HOPS);
                break;

            case '--help':
            case '-h':
                return { ...result, command: 'help' };

            default:
                if (arg.startsWith('-')) {
                    throw new UsageError(`Unknown option: ${arg}`);
                }
                if (!commandSeen) {
                    if (arg !== 'index' && arg !== 'query' && arg !== 'stats') {
                        throw new UsageError(`Unknown command: ${arg}`);
                    }
                    result.command = arg;
                    commandSeen = true;
                } else if (result.positional === undefined) {
                    result.positional = arg;
                } else {
                    throw new UsageError(`Unexpected argument: ${arg}`);
                }
                break;
        }
    }

    if (result.command === 'query' && !result.positional) {
        throw new UsageError('query needs the text to search for');
    }
    return result;
}

function printHelp(): void {
    console.log(`
code-graphrag - hybrid graph and vector retrieval over JavaScript sources

USAGE:
  code-graphrag <command> [OPTIONS]

COMMANDS:
  index [dir]        Extract, build the graph and embed function snippets
  query "<text>"     Vector search expanded through the code graph
  stats              Node and edge counts, vector table rows

OPTIONS:
  --clear            Empty the graph and drop the vector table before indexing
  --dry-run          Extract and build into memory only; print counts
  --top-k, -k <n>    Seeds taken from vector search (default: VECTOR_SEARCH_TOP_K)
  --hops <n>         Call graph hop bound (default: GRAPH_MAX_HOPS, max ${MAX_TRAVERSAL_HOPS})
  --help, -h         Show this help

ENVIRONMENT:
  NEO4J_URI, NEO4J_USER, NEO4J_PASSWORD, NEO4J_DATABASE, NEO4J_TRAVERSAL (cypher|apoc)
  OPENAI_API_KEY, OPENAI_EMBEDDING_MODEL
  CODEBASE_DIR, SOURCE_EXTENSIONS, MIN_FUNCTION_LENGTH
  VECTOR_SEARCH_TOP_K, GRAPH_MAX_HOPS, VECTOR_STORE_PATH
  LOG_LEVEL (debug|info|warn|error), LOG_FORMAT (pretty|json)
`);
}

/**
 * Connect to Neo4j. An unreachable server leaves the store not ready so
 * that graph work degrades to a no-op.
 */
async function openGraphStore(config: Config): Promise<Neo4jGraphStore> {
    const store = new Neo4jGraphStore(config.neo4j);
    try {
        await store.connect();
    } catch (error) {
        if (!(error instanceof ConnectivityError)) throw error;
        log.warn('Graph store unavailable', { error: error.message });
    }
    return store;
}

async function openVectorStore(config: Config): Promise<LanceVectorStore> {
    return LanceVectorStore.open(new OpenAIEmbeddingProvider(config.embeddings), {
        path: path.resolve(config.vectorStorePath),
        table: config.vectorTable,
    });
}

// ============================================================================
// Commands
// ============================================================================

async function commandIndex(args: CliArgs, config: Config): Promise<void> {
    const root = path.resolve(args.positional ?? config.codebaseDir);
    const scanner = new Scanner(new JavaScriptExtractor(createJavaScriptEngine()), {
        extensions: config.sourceExtensions,
        concurrency: config.extractConcurrency,
    });

    let store: GraphStore;
    let vectorStore: LanceVectorStore | undefined;
    if (args.dryRun) {
        store = new InMemoryGraphStore();
    } else {
        vectorStore = await openVectorStore(config);
        store = await openGraphStore(config);
    }

    try {
        if (args.clear) {
            await clearIndexes(store, vectorStore);
        }

        const builder = new GraphBuilder(store, new LocalImportResolver(root));
        const summary = await indexCodebase({
            root,
            scanner,
            builder,
            vectorStore,
            minFunctionLength: config.minFunctionLength,
        });

        console.log(`Files:      ${summary.files} (${summary.failures.length} failed)`);
        console.log(`Functions:  ${summary.functions}`);
        console.log(`Batches:    ${summary.build.committed.length} committed, ${summary.build.failed.length} failed`);
        console.log(`Snippets:   ${summary.snippets} (${summary.indexed} embedded)`);
        if (args.dryRun && store.isReady()) {
            const stats = await store.stats();
            console.log(`Graph:      ${stats.nodes} nodes, ${stats.edges} edges`);
        }
        for (const failure of summary.failures) {
            console.log(`  skipped ${failure.path}: ${failure.reason}`);
        }
        for (const warning of summary.warnings) {
            console.log(`  warning: ${warning}`);
        }
    } finally {
        await store.close();
        vectorStore?.close();
    }
}

async function commandQuery(args: CliArgs, config: Config): Promise<void> {
    const vectorStore = await openVectorStore(config);
    const store = await openGraphStore(config);
    try {
        const retriever = new HybridRetriever(vectorStore, store, { topK: config.topK, maxHops: config.maxHops });
        const result = await retriever.retrieve(args.positional ?? '', { topK: args.topK, maxHops: args.hops });
        console.log(JSON.stringify(result, null, 2));
    } finally {
        await store.close();
        vectorStore.close();
    }
}

async function commandStats(config: Config): Promise<void> {
    const store = await openGraphStore(config);
    try {
        if (store.isReady()) {
            const stats = await store.stats();
            console.log(`Nodes: ${stats.nodes}`);
            for (const [label, count] of Object.entries(stats.byLabel).sort()) {
                console.log(`  ${label}: ${count}`);
            }
            console.log(`Edges: ${stats.edges}`);
            for (const [type, count] of Object.entries(stats.byType).sort()) {
                console.log(`  ${type}: ${count}`);
            }
        } else {
            console.log('Graph store not connected');
        }
    } finally {
        await store.close();
    }

    if (config.embeddings.apiKey) {
        const vectorStore = await openVectorStore(config);
        try {
            console.log(`Vectors: ${await vectorStore.count()}`);
        } finally {
            vectorStore.close();
        }
    }
}

// ============================================================================
// Main
// ============================================================================

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (error) {
        if (!(error instanceof UsageError)) throw error;
        console.error(`Error: ${error.message}`);
        console.error('Use --help for usage information');
        return 2;
    }

    if (args.command === 'help') {
        printHelp();
        return 0;
    }

    try {
        const config = loadConfig();
        configureLogger(config.logging);
        switch (args.command) {
            case 'index':
                await commandIndex(args, config);
                break;
            case 'query':
                await commandQuery(args, config);
                break;
            case 'stats':
                await commandStats(config);
                break;
        }
        return 0;
    } catch (error) {
        if (error instanceof InitializationError) {
            log.error('Initialization failed', { error: error.message });
            return 1;
        }
        throw error;
    }
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            log.error('Unexpected failure', { error: errorMessage(error) });
            process.exitCode = 1;
        });
}
