/**
 * Hybrid retrieval
 *
 * Seeds come from vector search; each seed function is then expanded
 * through three graph relations (call neighbourhood, same file, shared
 * imports). Everything found is merged by id and returned in file order.
 */

import { createLogger, errorMessage } from '../common/logger';
import { assertHopBound } from '../graph/schema';
import type { FunctionHit, GraphHit, GraphReader } from '../graph/types';
import { parseFunctionKey } from '../graph/utils';
import type {
    Relation,
    ResultSource,
    RetrievalResult,
    RetrievedNode,
    RetrieveOptions,
    VectorMatch,
    VectorSearch,
} from './types';

const log = createLogger('retrieval');

export interface RetrievalDefaults {
    topK: number;
    maxHops: number;
}

const COMBINED_SOURCE: ResultSource = 'vector_search + graph_traversal';

function mergeSource(current: ResultSource, incoming: ResultSource): ResultSource {
    return current === incoming ? current : COMBINED_SOURCE;
}

/**
 * Ascending by file path, then start line, then id.
 */
export function compareResults(a: RetrievedNode, b: RetrievedNode): number {
    if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
    if (a.startLine !== b.startLine) return a.startLine - b.startLine;
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}

function fromHit(hit: GraphHit, source: ResultSource, relation: Relation): RetrievedNode {
    if (hit.kind === 'file') {
        return {
            id: hit.id,
            kind: 'file',
            filePath: hit.filePath,
            startLine: hit.startLine,
            hops: hit.hops,
            source,
            relations: [relation],
        };
    }
    return {
        id: hit.id,
        kind: 'function',
        name: hit.name,
        filePath: hit.filePath,
        startLine: hit.startLine,
        endLine: hit.endLine,
        functionKind: hit.functionKind,
        code: hit.code,
        hops: hit.hops,
        source,
        relations: [relation],
    };
}

/**
 * Seed record for an id the graph does not know; fields come from the key.
 */
function fromMatch(match: VectorMatch): RetrievedNode {
    const parsed = parseFunctionKey(match.id);
    return {
        id: match.id,
        kind: 'function',
        name: parsed?.name,
        filePath: parsed?.filePath ?? '',
        startLine: 0,
        score: match.score,
        source: 'vector_search',
        relations: ['vector_match'],
    };
}

class ResultSet {
    private readonly nodes = new Map<string, RetrievedNode>();

    add(incoming: RetrievedNode): void {
        const current = this.nodes.get(incoming.id);
        if (!current) {
            this.nodes.set(incoming.id, incoming);
            return;
        }

        const merged: RetrievedNode = { ...current };
        for (const [key, value] of Object.entries(incoming)) {
            if (value !== undefined && key !== 'relations' && key !== 'source' && key !== 'hops') {
                Object.assign(merged, { [key]: value });
            }
        }
        merged.source = mergeSource(current.source, incoming.source);
        merged.relations = [...current.relations, ...incoming.relations.filter((r) => !current.relations.includes(r))];
        if (incoming.hops !== undefined) {
            merged.hops = current.hops === undefined ? incoming.hops : Math.min(current.hops, incoming.hops);
        }
        this.nodes.set(incoming.id, merged);
    }

    sorted(): RetrievedNode[] {
        return [...this.nodes.values()].sort(compareResults);
    }
}

export class HybridRetriever {
    constructor(
        private readonly vectors: VectorSearch,
        private readonly graph: GraphReader,
        private readonly defaults: RetrievalDefaults
    ) {}

    public async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
        const topK = options.topK ?? this.defaults.topK;
        const maxHops = options.maxHops ?? this.defaults.maxHops;
        assertHopBound(maxHops);

        const warnings: string[] = [];

        let seeds: VectorMatch[];
        try {
            seeds = await this.vectors.search(query, topK);
        } catch (error) {
            warnings.push(`vector search failed: ${errorMessage(error)}`);
            log.warn('Vector search failed', { error: errorMessage(error) });
            return { results: [], warnings };
        }

        if (seeds.length === 0) {
            log.debug('No seeds, skipping graph expansion', { query });
            return { results: [], warnings };
        }

        const results = new ResultSet();
        const seedIds = [...new Set(seeds.map((seed) => seed.id))];

        const details = new Map<string, FunctionHit>();
        const found = await this.guard(warnings, 'seed lookup', () => this.graph.getFunctions(seedIds));
        for (const hit of found) details.set(hit.id, hit);

        for (const seed of seeds) {
            const hit = details.get(seed.id);
            const node = hit
                ? { ...fromHit(hit, 'vector_search', 'vector_match'), score: seed.score }
                : fromMatch(seed);
            results.add(node);
        }

        const expansions = await Promise.all(
            seedIds.map((id) =>
                Promise.all([
                    this.guard(warnings, `call_graph(${id})`, () => this.graph.callNeighbours(id, maxHops)),
                    this.guard(warnings, `same_file(${id})`, () => this.graph.siblingFunctions(id)),
                    this.guard(warnings, `shared_dependency(${id})`, () => this.graph.sharedDependencyFunctions(id)),
                ])
            )
        );

        for (const [callGraph, sameFile, sharedDependency] of expansions) {
            for (const hit of callGraph) results.add(fromHit(hit, 'graph_traversal', 'call_graph'));
            for (const hit of sameFile) results.add(fromHit(hit, 'graph_traversal', 'same_file'));
            for (const hit of sharedDependency) results.add(fromHit(hit, 'graph_traversal', 'shared_dependency'));
        }

        const sorted = results.sorted();
        log.info('Retrieved', { seeds: seedIds.length, results: sorted.length, warnings: warnings.length });
        return { results: sorted, warnings };
    }

    /**
     * Runs one graph relation; a failure becomes a warning and no hits.
     */
    private async guard<T>(warnings: string[], label: string, run: () => Promise<T[]>): Promise<T[]> {
        try {
            return await run();
        } catch (error) {
            warnings.push(`${label} failed: ${errorMessage(error)}`);
            log.warn('Graph relation failed', { relation: label, error: errorMessage(error) });
            return [];
        }
    }
}
