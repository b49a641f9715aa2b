/**
 * Hybrid Retriever Tests
 *
 * Vector search and graph reads are replaced by in-process fakes.
 */

import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import type { FunctionHit, GraphHit, GraphReader } from '../graph/types';
import { compareResults, HybridRetriever } from './hybrid';
import type { RetrievedNode, VectorMatch, VectorSearch } from './types';

function fn(id: string, startLine: number, hops?: number): FunctionHit {
    const [filePath, name] = id.split('::');
    return { kind: 'function', id, name, filePath, startLine, endLine: startLine + 1, hops };
}

interface FakeGraph extends GraphReader {
    calls: string[];
}

function fakeGraph(relations: {
    functions?: FunctionHit[];
    neighbours?: Record<string, GraphHit[]>;
    siblings?: Record<string, FunctionHit[]>;
    shared?: Record<string, FunctionHit[]>;
    failing?: string;
}): FakeGraph {
    const calls: string[] = [];
    const run = async <T>(relation: string, id: string, hits: T[]): Promise<T[]> => {
        calls.push(`${relation}(${id})`);
        if (relations.failing === relation) throw new Error('boom');
        return hits;
    };
    return {
        calls,
        getFunctions: async (ids) => {
            calls.push('getFunctions');
            return (relations.functions ?? []).filter((hit) => ids.includes(hit.id));
        },
        callNeighbours: (id) => run('callNeighbours', id, relations.neighbours?.[id] ?? []),
        siblingFunctions: (id) => run('siblingFunctions', id, relations.siblings?.[id] ?? []),
        sharedDependencyFunctions: (id) => run('sharedDependencyFunctions', id, relations.shared?.[id] ?? []),
    };
}

function vectors(matches: VectorMatch[] | Error): VectorSearch {
    return {
        search: async () => {
            if (matches instanceof Error) throw matches;
            return matches;
        },
    };
}

const DEFAULTS = { topK: 5, maxHops: 2 };

describe('HybridRetriever', () => {
    test('no seeds means no graph reads', async () => {
        const graph = fakeGraph({});
        const result = await new HybridRetriever(vectors([]), graph, DEFAULTS).retrieve('anything');
        assert.deepEqual(result, { results: [], warnings: [] });
        assert.deepEqual(graph.calls, []);
    });

    test('vector search failure is a warning', async () => {
        const graph = fakeGraph({});
        const result = await new HybridRetriever(vectors(new Error('offline')), graph, DEFAULTS).retrieve('q');
        assert.deepEqual(result, { results: [], warnings: ['vector search failed: offline'] });
        assert.deepEqual(graph.calls, []);
    });

    test('expands seeds through all three relations in file order', async () => {
        const graph = fakeGraph({
            functions: [fn('a.js::foo', 1)],
            neighbours: {
                'a.js::foo': [fn('a.js::bar', 5, 1), { kind: 'file', id: 'b.js', filePath: 'b.js', startLine: 2, hops: 1 }],
            },
            siblings: { 'a.js::foo': [fn('a.js::bar', 5)] },
            shared: { 'a.js::foo': [fn('c.js::baz', 3)] },
        });
        const { results, warnings } = await new HybridRetriever(
            vectors([{ id: 'a.js::foo', score: 0.9 }]),
            graph,
            DEFAULTS
        ).retrieve('find foo');

        assert.deepEqual(warnings, []);
        assert.deepEqual(results.map((r) => r.id), ['a.js::foo', 'a.js::bar', 'b.js', 'c.js::baz']);

        const [foo, bar, file, baz] = results;
        assert.equal(foo.source, 'vector_search');
        assert.equal(foo.score, 0.9);
        assert.deepEqual(foo.relations, ['vector_match']);
        assert.equal(bar.source, 'graph_traversal');
        assert.deepEqual(bar.relations, ['call_graph', 'same_file']);
        assert.equal(bar.hops, 1);
        assert.deepEqual(file, {
            id: 'b.js',
            kind: 'file',
            filePath: 'b.js',
            startLine: 2,
            hops: 1,
            source: 'graph_traversal',
            relations: ['call_graph'],
        });
        assert.deepEqual(baz.relations, ['shared_dependency']);
    });

    test('a seed reached from another seed has both sources', async () => {
        const graph = fakeGraph({
            functions: [fn('a.js::foo', 1), fn('a.js::bar', 5)],
            neighbours: { 'a.js::bar': [fn('a.js::foo', 1, 1)] },
        });
        const { results } = await new HybridRetriever(
            vectors([
                { id: 'a.js::bar', score: 0.8 },
                { id: 'a.js::foo', score: 0.7 },
            ]),
            graph,
            DEFAULTS
        ).retrieve('q');

        const foo = results.find((r) => r.id === 'a.js::foo');
        assert.equal(foo?.source, 'vector_search + graph_traversal');
        assert.deepEqual(foo?.relations, ['vector_match', 'call_graph']);
        assert.equal(foo?.score, 0.7);
        assert.equal(foo?.hops, 1);
    });

    test('a failing relation becomes a warning and the rest still return', async () => {
        const graph = fakeGraph({
            functions: [fn('a.js::foo', 1)],
            shared: { 'a.js::foo': [fn('c.js::baz', 3)] },
            failing: 'siblingFunctions',
        });
        const { results, warnings } = await new HybridRetriever(
            vectors([{ id: 'a.js::foo', score: 0.9 }]),
            graph,
            DEFAULTS
        ).retrieve('q');

        assert.deepEqual(warnings, ['same_file(a.js::foo) failed: boom']);
        assert.deepEqual(results.map((r) => r.id), ['a.js::foo', 'c.js::baz']);
    });

    test('seeds unknown to the graph keep the fields of their id', async () => {
        const { results } = await new HybridRetriever(
            vectors([{ id: 'gone.js::old', score: 0.5 }]),
            fakeGraph({}),
            DEFAULTS
        ).retrieve('q');

        assert.deepEqual(results, [
            {
                id: 'gone.js::old',
                kind: 'function',
                name: 'old',
                filePath: 'gone.js',
                startLine: 0,
                score: 0.5,
                source: 'vector_search',
                relations: ['vector_match'],
            },
        ]);
    });

    test('hop bound is checked before searching', async () => {
        const graph = fakeGraph({});
        await assert.rejects(
            new HybridRetriever(vectors([]), graph, DEFAULTS).retrieve('q', { maxHops: 11 }),
            RangeError
        );
    });

    test('passes the hop bound to the traversal', async () => {
        const seen: number[] = [];
        const graph = fakeGraph({ functions: [fn('a.js::foo', 1)] });
        graph.callNeighbours = async (_id, maxHops) => {
            seen.push(maxHops);
            return [];
        };
        await new HybridRetriever(vectors([{ id: 'a.js::foo', score: 1 }]), graph, DEFAULTS).retrieve('q', { maxHops: 4 });
        assert.deepEqual(seen, [4]);
    });
});

describe('compareResults', () => {
    const node = (id: string, filePath: string, startLine: number): RetrievedNode => ({
        id,
        kind: 'function',
        filePath,
        startLine,
        source: 'graph_traversal',
        relations: [],
    });

    test('orders by path, then line, then id', () => {
        const sorted = [node('z', 'b.js', 1), node('y', 'a.js', 9), node('b', 'a.js', 2), node('a', 'a.js', 2)].sort(
            compareResults
        );
        assert.deepEqual(sorted.map((n) => n.id), ['a', 'b', 'y', 'z']);
    });
});
