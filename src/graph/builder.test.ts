/**
 * Graph Builder Tests
 *
 * Extracts real sources from a temp workspace and builds them into the
 * in-memory store.
 */

import { strict as assert } from 'assert';
import { test, describe, before, after } from 'node:test';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { JavaScriptExtractor } from '../parser/javascript/extractor';
import { createJavaScriptEngine } from '../parser/parser';
import type { CodeFile } from '../parser/types';
import { buildCorpusIndex, countLines, GraphBuilder } from './builder';
import { LocalImportResolver } from './resolution';
import { EdgeType, NodeLabel } from './schema';
import { InMemoryGraphStore } from './store/memory';
import type { GraphBatch, GraphWriter } from './types';

const SOURCES: Record<string, string> = {
    'a.js': 'function foo(){ return bar(); } function bar(){ return 1; }\nmodule.exports = { foo, bar };\n',
    'b.js': "const { foo } = require('./a');\nfoo();\n",
    'c.js': "const path = require('path');\nfunction join(a, b = '/') { path.join(a, b); lodash.map(a); lodash.map(b); }\n",
};

interface TestWorkspace {
    root: string;
    files: CodeFile[];
    cleanup: () => void;
}

function createTestWorkspace(): TestWorkspace {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'graphrag-builder-test-'));
    const extractor = new JavaScriptExtractor(createJavaScriptEngine());
    const files: CodeFile[] = [];
    for (const [name, source] of Object.entries(SOURCES)) {
        fs.writeFileSync(path.join(root, name), source);
        files.push(extractor.extract(name, source));
    }
    return {
        root,
        files,
        cleanup: () => {
            fs.rmSync(root, { recursive: true, force: true });
        },
    };
}

describe('countLines', () => {
    test('a final newline does not open another line', () => {
        assert.equal(countLines(''), 0);
        assert.equal(countLines('a'), 1);
        assert.equal(countLines('a\n'), 1);
        assert.equal(countLines('a\nb'), 2);
        assert.equal(countLines('a\n\n'), 2);
        assert.equal(countLines('\n'), 1);
    });
});

describe('GraphBuilder.buildFile', () => {
    let workspace: TestWorkspace;
    let builder: GraphBuilder;

    before(() => {
        workspace = createTestWorkspace();
        builder = new GraphBuilder(new InMemoryGraphStore(), new LocalImportResolver(workspace.root));
    });

    after(() => {
        workspace.cleanup();
    });

    test('starts with the File node and keys the batch by path', () => {
        const batch = builder.buildFile(workspace.files[0]);
        assert.equal(batch.id, 'a.js');
        const [first] = batch.mutations;
        assert.equal(first.kind, 'node');
        assert.ok(first.kind === 'node');
        assert.equal(first.label, NodeLabel.File);
        assert.deepEqual(first.props, {
            path: 'a.js',
            name: 'a.js',
            language: 'javascript',
            lineCount: 2,
            size: 91,
            functionCount: 2,
            summary: '2 function(s): foo, bar',
        });
    });

    test('aggregates repeated calls into one edge with a call count', () => {
        // path.join() matches the local join by name
        const batch = builder.buildFile(workspace.files[2]);
        const calls = batch.mutations.filter((m) => m.kind === 'edge' && m.type === EdgeType.CALLS);
        assert.deepEqual(
            calls.map((m) => (m.kind === 'edge' ? [m.from.key, m.to.key, m.props.callCount] : [])),
            [
                ['c.js::join', 'c.js::join', 1],
                ['c.js::join', 'external::map', 2],
            ]
        );
    });

    test('external stubs only set properties on creation', () => {
        const batch = builder.buildFile(workspace.files[2]);
        const stub = batch.mutations.find((m) => m.kind === 'node' && m.key === 'external::map');
        assert.ok(stub && stub.kind === 'node');
        assert.equal(stub.onCreateOnly, true);
        assert.deepEqual(stub.props, { id: 'external::map', name: 'map', external: true });
    });

    test('parameters and requires carry their metadata', () => {
        const batch = builder.buildFile(workspace.files[2]);
        const param = batch.mutations.find((m) => m.kind === 'node' && m.label === NodeLabel.Parameter && m.props.index === 1);
        assert.ok(param && param.kind === 'node');
        assert.deepEqual(param.props, {
            id: 'c.js::join::param::1',
            name: 'b',
            index: 1,
            defaultValue: "'/'",
            isRest: false,
            functionId: 'c.js::join',
        });

        const requires = batch.mutations.find((m) => m.kind === 'edge' && m.type === EdgeType.REQUIRES);
        assert.ok(requires && requires.kind === 'edge');
        assert.deepEqual(requires.props, { variableName: 'path', bindings: ['path'], importKind: 'assignment', line: 1 });
    });

    test('cross-file calls need the target in the corpus', () => {
        const alone = builder.buildFile(workspace.files[1]);
        const withCorpus = builder.buildFile(workspace.files[1], buildCorpusIndex(workspace.files));
        const target = (batch: GraphBatch) =>
            batch.mutations.flatMap((m) => (m.kind === 'edge' && m.type === EdgeType.CALLS ? [m.to.key] : []));
        assert.deepEqual(target(alone), ['external::foo']);
        assert.deepEqual(target(withCorpus), ['a.js::foo']);
    });
});

describe('GraphBuilder.build', () => {
    let workspace: TestWorkspace;

    before(() => {
        workspace = createTestWorkspace();
    });

    after(() => {
        workspace.cleanup();
    });

    test('links b.js to a.js through the import and the call', async () => {
        const store = new InMemoryGraphStore();
        const report = await new GraphBuilder(store, new LocalImportResolver(workspace.root)).build(workspace.files);

        assert.deepEqual(report.committed, ['a.js', 'b.js', 'c.js']);
        assert.deepEqual(report.failed, []);
        assert.equal(report.dependenciesRecomputed, true);

        const calls = store.edges(EdgeType.CALLS).map((e) => [e.from, e.to]);
        assert.ok(calls.some(([from, to]) => from === 'a.js::foo' && to === 'a.js::bar'));
        assert.ok(calls.some(([from, to]) => from === 'b.js' && to === 'a.js::foo'));

        assert.deepEqual(
            store.edges(EdgeType.REQUIRES).map((e) => [e.from, e.to]),
            [['b.js', './a'], ['c.js', 'path']]
        );
        assert.deepEqual(store.edges(EdgeType.DEPENDS_ON), [
            { from: 'b.js', to: 'a.js', props: { viaImport: true, strength: 1 } },
        ]);
    });

    test('definitions win over placeholders in either build order', async () => {
        const orders = [workspace.files, [workspace.files[1], workspace.files[0]]];
        for (const files of orders) {
            const store = new InMemoryGraphStore();
            await new GraphBuilder(store, new LocalImportResolver(workspace.root)).build(files);
            const foo = store.node(NodeLabel.Function, 'a.js::foo');
            assert.equal(foo?.kind, 'declaration');
            assert.equal(foo?.startLine, 1);
            assert.equal(foo?.external, false);
        }
    });

    test('rebuilding the same corpus changes nothing', async () => {
        const store = new InMemoryGraphStore();
        const builder = new GraphBuilder(store, new LocalImportResolver(workspace.root));
        await builder.build(workspace.files);
        const first = await store.stats();
        const firstCalls = store.edges(EdgeType.CALLS);
        await builder.build(workspace.files);

        assert.deepEqual(await store.stats(), first);
        assert.deepEqual(store.edges(EdgeType.CALLS), firstCalls);
        assert.equal(store.edges(EdgeType.DEPENDS_ON)[0].props.strength, 1);
    });

    test('a store that is not ready makes the build a no-op', async () => {
        const store = new InMemoryGraphStore();
        await store.close();
        const report = await new GraphBuilder(store, new LocalImportResolver(workspace.root)).build(workspace.files);
        assert.equal(report.skipped, true);
        assert.deepEqual(report.committed, []);
    });

    test('a failing batch is reported and the others commit', async () => {
        const applied: string[] = [];
        let recomputed = false;
        const writer: GraphWriter = {
            isReady: () => true,
            applyBatch: async (batch) => {
                if (batch.id === 'b.js') throw new Error('constraint violated');
                applied.push(batch.id);
            },
            recomputeDependencies: async () => {
                recomputed = true;
            },
        };

        const report = await new GraphBuilder(writer, new LocalImportResolver(workspace.root)).build(workspace.files);
        assert.deepEqual(applied, ['a.js', 'c.js']);
        assert.deepEqual(report.committed, ['a.js', 'c.js']);
        assert.deepEqual(report.failed, [{ file: 'b.js', reason: 'constraint violated' }]);
        assert.equal(recomputed, true);
    });
});
