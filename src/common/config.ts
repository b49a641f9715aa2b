/**
 * Configuration Module
 *
 * Loads and validates configuration from environment variables.
 * Collaborators (graph store, embeddings, scanner) receive the typed
 * values through their constructors; nothing reads process.env later.
 */

import { z } from 'zod';
import { MAX_TRAVERSAL_HOPS } from '../graph/schema';
import { InitializationError } from './errors';
import { LOG_FORMATS, LOG_LEVELS } from './logger';
import type { LogFormat, LogLevel } from './logger';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const extensionList = z
    .string()
    .default('.js')
    .transform((value) =>
        value
            .split(',')
            .map((ext) => ext.trim())
            .filter((ext) => ext.length > 0)
            .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
    )
    .pipe(z.array(z.string()).min(1));

export const ConfigSchema = z.object({
    NEO4J_URI: z.string().default('bolt://localhost:7687'),
    NEO4J_USER: z.string().default('neo4j'),
    NEO4J_PASSWORD: z.string().optional(),
    NEO4J_DATABASE: z.string().default('neo4j'),
    NEO4J_CONNECT_TIMEOUT_MS: positiveInt(10_000),
    NEO4J_QUERY_TIMEOUT_MS: positiveInt(15_000),
    NEO4J_TRAVERSAL: z.enum(['cypher', 'apoc']).default('cypher'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_TIMEOUT_MS: positiveInt(30_000),
    CODEBASE_DIR: z.string().default('.'),
    SOURCE_EXTENSIONS: extensionList,
    MIN_FUNCTION_LENGTH: positiveInt(25),
    VECTOR_SEARCH_TOP_K: positiveInt(5),
    GRAPH_MAX_HOPS: z.coerce.number().int().min(1).max(MAX_TRAVERSAL_HOPS).default(2),
    EXTRACT_CONCURRENCY: positiveInt(8),
    VECTOR_STORE_PATH: z.string().default('.graphrag/lancedb'),
    VECTOR_TABLE: z.string().min(1).default('code_snippets'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_FORMAT: z.enum(LOG_FORMATS).default('pretty'),
});

export interface Config {
    neo4j: {
        uri: string;
        user: string;
        password?: string;
        database: string;
        connectTimeoutMs: number;
        queryTimeoutMs: number;
        traversal: 'cypher' | 'apoc';
    };
    embeddings: {
        apiKey?: string;
        model: string;
        timeoutMs: number;
    };
    codebaseDir: string;
    sourceExtensions: string[];
    minFunctionLength: number;
    topK: number;
    maxHops: number;
    extractConcurrency: number;
    /** LanceDB database directory */
    vectorStorePath: string;
    vectorTable: string;
    logging: {
        level: LogLevel;
        format: LogFormat;
    };
}

/**
 * Load configuration from an environment map (defaults to process.env).
 *
 * @throws InitializationError naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new InitializationError(`Invalid configuration: ${problems}`);
    }

    const values = parsed.data;
    return {
        neo4j: {
            uri: values.NEO4J_URI,
            user: values.NEO4J_USER,
            password: values.NEO4J_PASSWORD,
            database: values.NEO4J_DATABASE,
            connectTimeoutMs: values.NEO4J_CONNECT_TIMEOUT_MS,
            queryTimeoutMs: values.NEO4J_QUERY_TIMEOUT_MS,
            traversal: values.NEO4J_TRAVERSAL,
        },
        embeddings: {
            apiKey: values.OPENAI_API_KEY,
            model: values.OPENAI_EMBEDDING_MODEL,
            timeoutMs: values.EMBEDDING_TIMEOUT_MS,
        },
        codebaseDir: values.CODEBASE_DIR,
        sourceExtensions: values.SOURCE_EXTENSIONS,
        minFunctionLength: values.MIN_FUNCTION_LENGTH,
        topK: values.VECTOR_SEARCH_TOP_K,
        maxHops: values.GRAPH_MAX_HOPS,
        extractConcurrency: values.EXTRACT_CONCURRENCY,
        vectorStorePath: values.VECTOR_STORE_PATH,
        vectorTable: values.VECTOR_TABLE,
        logging: {
            level: values.LOG_LEVEL,
            format: values.LOG_FORMAT,
        },
    };
}

