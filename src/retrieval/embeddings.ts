/**
 * OpenAI embeddings
 */

import OpenAI from 'openai';
import { InitializationError } from '../common/errors';
import { createLogger } from '../common/logger';
import type { EmbeddingProvider } from './types';

const log = createLogger('embeddings');

/** Inputs per embeddings request */
const REQUEST_BATCH_SIZE = 96;

export interface OpenAIEmbeddingOptions {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    /** Pre-built client, for tests and custom base URLs */
    client?: OpenAI;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly model: string;
    private readonly client: OpenAI;

    /**
     * @throws InitializationError when neither an API key nor a client is given
     */
    constructor(options: OpenAIEmbeddingOptions) {
        this.model = options.model;
        if (options.client) {
            this.client = options.client;
        } else if (options.apiKey) {
            this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 2 });
        } else {
            throw new InitializationError('OPENAI_API_KEY is required for embeddings');
        }
    }

    public async embed(texts: readonly string[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let start = 0; start < texts.length; start += REQUEST_BATCH_SIZE) {
            const input = texts.slice(start, start + REQUEST_BATCH_SIZE);
            const response = await this.client.embeddings.create({ model: this.model, input });
            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            vectors.push(...ordered.map((item) => item.embedding));
            log.debug('Embedded batch', { from: start, count: input.length });
        }
        return vectors;
    }
}
