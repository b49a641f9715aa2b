/**
 * LanceDB vector store.
 *
 * One table holds a row per snippet: `{ id, text, model, vector }`, where
 * `id` is the Function node key. Every row records the embedding model; a
 * table written with another model is left unread until the next index()
 * overwrites it.
 */

import * as lancedb from '@lancedb/lancedb';
import { z } from 'zod';
import { InitializationError } from '../common/errors';
import { createLogger, errorMessage } from '../common/logger';
import type { EmbeddingProvider, Snippet, VectorMatch, VectorSearch } from './types';

const log = createLogger('vector-store');

export const DEFAULT_VECTOR_TABLE = 'code_snippets';

/** Ids per delete predicate */
const DELETE_CHUNK_SIZE = 200;

const MatchRowSchema = z.object({ id: z.string(), _distance: z.number() });
const ModelRowSchema = z.object({ model: z.string() });

export interface LanceVectorStoreOptions {
    /** Database directory */
    path: string;
    table?: string;
}

function quote(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

export class LanceVectorStore implements VectorSearch {
    private table: lancedb.Table | null = null;

    private constructor(
        private readonly connection: lancedb.Connection,
        private readonly tableName: string,
        private readonly embeddings: EmbeddingProvider
    ) {}

    /**
     * Connect and open the snippet table when one exists for the current
     * embedding model.
     *
     * @throws InitializationError when the database cannot be opened
     */
    static async open(embeddings: EmbeddingProvider, options: LanceVectorStoreOptions): Promise<LanceVectorStore> {
        let connection: lancedb.Connection;
        try {
            connection = await lancedb.connect(options.path);
        } catch (error) {
            throw new InitializationError(`Cannot open vector store at ${options.path}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        const store = new LanceVectorStore(connection, options.table ?? DEFAULT_VECTOR_TABLE, embeddings);
        await store.openExisting();
        return store;
    }

    private async openExisting(): Promise<void> {
        const names = await this.connection.tableNames();
        if (!names.includes(this.tableName)) {
            log.info('No vector table yet', { table: this.tableName });
            return;
        }

        const table = await this.connection.openTable(this.tableName);
        const rows: unknown[] = await table.query().select(['model']).limit(1).toArray();
        const first = rows.length > 0 ? ModelRowSchema.safeParse(rows[0]) : null;
        if (first && !first.success) {
            throw new InitializationError(`Vector table ${this.tableName} has no model column`);
        }
        if (first && first.data.model !== this.embeddings.model) {
            log.warn('Vector table uses another model, ignoring it', {
                table: this.tableName,
                stored: first.data.model,
                current: this.embeddings.model,
            });
            return;
        }
        this.table = table;
    }

    public async count(): Promise<number> {
        return this.table ? this.table.countRows() : 0;
    }

    /**
     * Embed and store snippets. Rows whose id is re-indexed are replaced.
     */
    public async index(snippets: readonly Snippet[]): Promise<number> {
        if (snippets.length === 0) return 0;

        const vectors = await this.embeddings.embed(snippets.map((snippet) => snippet.text));
        if (vectors.length !== snippets.length) {
            throw new Error(`Embedding provider returned ${vectors.length} vectors for ${snippets.length} snippets`);
        }
        const rows = snippets.map((snippet, i) => ({
            id: snippet.id,
            text: snippet.text,
            model: this.embeddings.model,
            vector: vectors[i],
        }));

        if (this.table) {
            await this.deleteIds(this.table, snippets.map((snippet) => snippet.id));
            await this.table.add(rows);
        } else {
            this.table = await this.connection.createTable(this.tableName, rows, { mode: 'overwrite' });
        }
        log.info('Indexed snippets', { count: rows.length, table: this.tableName });
        return rows.length;
    }

    private async deleteIds(table: lancedb.Table, ids: readonly string[]): Promise<void> {
        for (let start = 0; start < ids.length; start += DELETE_CHUNK_SIZE) {
            const chunk = ids.slice(start, start + DELETE_CHUNK_SIZE);
            await table.delete(`id IN (${chunk.map(quote).join(', ')})`);
        }
    }

    /**
     * Top `topK` ids by cosine similarity, best first; equal scores by id.
     */
    public async search(query: string, topK: number): Promise<VectorMatch[]> {
        if (topK <= 0 || !this.table) return [];

        const [queryVector] = await this.embeddings.embed([query]);
        if (!queryVector) return [];

        const rows: unknown[] = await this.table
            .vectorSearch(queryVector)
            .distanceType('cosine')
            .limit(topK)
            .toArray();

        const matches: VectorMatch[] = [];
        for (const row of rows) {
            const parsed = MatchRowSchema.safeParse(row);
            if (!parsed.success) {
                log.warn('Skipping malformed vector row', { error: parsed.error.issues[0]?.message });
                continue;
            }
            matches.push({ id: parsed.data.id, score: 1 - parsed.data._distance });
        }
        return matches.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    }

    /**
     * Remove the snippet table. The next index() creates it again.
     */
    public async drop(): Promise<void> {
        const names = await this.connection.tableNames();
        if (names.includes(this.tableName)) {
            await this.connection.dropTable(this.tableName);
            log.info('Dropped vector table', { table: this.tableName });
        }
        this.table = null;
    }

    public close(): void {
        this.table?.close();
        this.table = null;
        this.connection.close();
    }
}
