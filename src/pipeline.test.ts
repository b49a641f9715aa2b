/**
 * End-to-end: scan a workspace, build the in-memory graph, embed snippets
 * with a keyword embedder, then retrieve.
 */

import { strict as assert } from 'assert';
import { test, describe, before, after } from 'node:test';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { GraphBuilder } from './graph/builder';
import { LocalImportResolver } from './graph/resolution';
import { InMemoryGraphStore } from './graph/store/memory';
import { JavaScriptExtractor } from './parser/javascript/extractor';
import { createJavaScriptEngine } from './parser/parser';
import { Scanner } from './parser/scanner';
import { clearIndexes, indexCodebase } from './pipeline';
import { HybridRetriever } from './retrieval/hybrid';
import type { EmbeddingProvider } from './retrieval/types';
import { LanceVectorStore } from './retrieval/vector-store';

/** [occurrences of the marker, 1]: texts with the marker score highest */
class MarkerEmbeddings implements EmbeddingProvider {
    readonly model = 'marker-test';

    constructor(private readonly marker: string, private readonly fail = false) {}

    async embed(texts: readonly string[]): Promise<number[][]> {
        if (this.fail) throw new Error('quota exceeded');
        return texts.map((text) => [text.split(this.marker).length - 1, 1]);
    }
}

interface TestWorkspace {
    root: string;
    cleanup: () => void;
}

function createTestWorkspace(sources: Record<string, string>): TestWorkspace {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'graphrag-pipeline-test-'));
    for (const [name, source] of Object.entries(sources)) {
        fs.writeFileSync(path.join(root, name), source);
    }
    return {
        root,
        cleanup: () => {
            fs.rmSync(root, { recursive: true, force: true });
        },
    };
}

const engine = createJavaScriptEngine();
const openVectorStores: LanceVectorStore[] = [];

after(() => {
    for (const vectorStore of openVectorStores) vectorStore.close();
});

/**
 * Every run starts from an empty vector table so the tests stay independent.
 */
async function indexWorkspace(root: string, embeddings: EmbeddingProvider, store = new InMemoryGraphStore()) {
    const vectorStore = await LanceVectorStore.open(embeddings, { path: path.join(root, '.graphrag', 'lancedb') });
    openVectorStores.push(vectorStore);
    await vectorStore.drop();
    const summary = await indexCodebase({
        root,
        scanner: new Scanner(new JavaScriptExtractor(engine)),
        builder: new GraphBuilder(store, new LocalImportResolver(root)),
        vectorStore,
    });
    return { store, vectorStore, summary };
}

describe('indexCodebase and retrieve', () => {
    let workspace: TestWorkspace;

    before(() => {
        workspace = createTestWorkspace({
            'a.js': 'function foo() { return bar(); }\nfunction bar() { return 1; }\nmodule.exports = { foo, bar };\n',
            'b.js': "const { foo } = require('./a');\nfoo();\n",
        });
    });

    after(() => {
        workspace.cleanup();
    });

    test('indexes both files and persists the vectors', async () => {
        const { summary } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo'));
        assert.equal(summary.files, 2);
        assert.equal(summary.functions, 2);
        assert.deepEqual(summary.build.committed, ['a.js', 'b.js']);
        assert.equal(summary.snippets, 2);
        assert.equal(summary.indexed, 2);
        assert.deepEqual(summary.warnings, []);
        assert.ok(fs.existsSync(path.join(workspace.root, '.graphrag', 'lancedb')));
    });

    test('a seed expands to its callee and to the calling file', async () => {
        const { store, vectorStore } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo'));
        const retriever = new HybridRetriever(vectorStore, store, { topK: 1, maxHops: 2 });
        const { results, warnings } = await retriever.retrieve('foo');

        assert.deepEqual(warnings, []);
        assert.deepEqual(
            results.map((r) => [r.id, r.kind, r.startLine, r.source]),
            [
                ['a.js::foo', 'function', 1, 'vector_search'],
                ['a.js::bar', 'function', 2, 'graph_traversal'],
                ['b.js', 'file', 2, 'graph_traversal'],
            ]
        );
        assert.deepEqual(results[1].relations, ['call_graph', 'same_file']);
        assert.deepEqual(results[2].relations, ['call_graph']);
    });

    test('an unavailable graph store is a warning, vectors are still indexed', async () => {
        const store = new InMemoryGraphStore();
        await store.close();
        const { summary } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo'), store);
        assert.deepEqual(summary.warnings, ['graph store not connected, graph build skipped']);
        assert.equal(summary.indexed, 2);
    });

    test('clearing empties the graph and drops the vector table', async () => {
        const { store, vectorStore } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo'));
        assert.equal(await vectorStore.count(), 2);

        await clearIndexes(store, vectorStore);
        assert.equal((await store.stats()).nodes, 0);
        assert.equal(await vectorStore.count(), 0);
        assert.deepEqual(await vectorStore.search('foo', 3), []);
    });

    test('an embedding failure is a warning, the graph is still built', async () => {
        const { store, summary } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo', true));
        assert.deepEqual(summary.warnings, ['vector indexing failed: quota exceeded']);
        assert.equal(summary.indexed, 0);
        assert.equal((await store.stats()).byLabel.File, 2);
    });
});

describe('hop-bounded expansion across files', () => {
    let workspace: TestWorkspace;

    before(() => {
        workspace = createTestWorkspace({
            'a.js': "const { b } = require('./b');\nfunction a() { return b('start'); }\n",
            'b.js': "const { c } = require('./c');\nfunction b() { return c(); }\nmodule.exports = { b };\n",
            'c.js': "const { d } = require('./d');\nfunction c() { return d(); }\nmodule.exports = { c };\n",
            'd.js': 'function d() { return 42; }\nmodule.exports = { d };\n',
        });
    });

    after(() => {
        workspace.cleanup();
    });

    test('two hops reach c but not d', async () => {
        const { store, vectorStore } = await indexWorkspace(workspace.root, new MarkerEmbeddings('start'));
        const retriever = new HybridRetriever(vectorStore, store, { topK: 1, maxHops: 2 });
        const { results } = await retriever.retrieve('start');

        assert.deepEqual(
            results.map((r) => [r.id, r.hops]),
            [
                ['a.js::a', undefined],
                ['b.js::b', 1],
                ['c.js::c', 2],
            ]
        );
    });

    test('three hops reach d', async () => {
        const { store, vectorStore } = await indexWorkspace(workspace.root, new MarkerEmbeddings('start'));
        const retriever = new HybridRetriever(vectorStore, store, { topK: 1, maxHops: 2 });
        const { results } = await retriever.retrieve('start', { maxHops: 3 });
        assert.deepEqual(results.map((r) => r.id), ['a.js::a', 'b.js::b', 'c.js::c', 'd.js::d']);
    });

    test('import strength follows cross-file calls', async () => {
        const { store } = await indexWorkspace(workspace.root, new MarkerEmbeddings('start'));
        assert.deepEqual(
            store.edges('DEPENDS_ON').map((e) => [e.from, e.to, e.props.strength]),
            [
                ['a.js', 'b.js', 1],
                ['b.js', 'c.js', 1],
                ['c.js', 'd.js', 1],
            ]
        );
    });
});

describe('renamed destructured imports', () => {
    let workspace: TestWorkspace;

    before(() => {
        workspace = createTestWorkspace({
            'a.js': 'function foo() { return 1; }\nmodule.exports = { foo };\n',
            'b.js': "const { foo: f } = require('./a');\nf();\n",
        });
    });

    after(() => {
        workspace.cleanup();
    });

    test('a call through the local name links to the exported function', async () => {
        const { store } = await indexWorkspace(workspace.root, new MarkerEmbeddings('foo'));
        assert.deepEqual(
            store.edges('CALLS').map((e) => [e.from, e.to]),
            [['b.js', 'a.js::foo']]
        );
        assert.deepEqual(
            store.edges('DEPENDS_ON').map((e) => [e.from, e.to, e.props.strength]),
            [['b.js', 'a.js', 1]]
        );
    });
});
