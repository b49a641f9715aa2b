import { strict as assert } from 'assert';
import { test, describe } from 'node:test';
import neo4j, { isInt } from 'neo4j-driver';

import { BatchWriteError, ConnectivityError, InitializationError } from '../../common/errors';
import { EdgeType, ENSURE_NODE, NodeLabel, UPSERT_NODE } from '../schema';
import type { GraphBatch } from '../types';
import { decodeProperties, encodeProperties, groupMutations, Neo4jGraphStore } from './neo4j';

const OPTIONS = {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    database: 'neo4j',
    connectTimeoutMs: 100,
    queryTimeoutMs: 100,
};

describe('property encoding', () => {
    test('integers become driver integers, other values pass through', () => {
        const encoded = encodeProperties({ line: 3, ratio: 1.5, name: 'foo', tags: ['a'], flag: true });
        const line = encoded.line;
        assert.ok(isInt(line));
        assert.equal(line.toNumber(), 3);
        assert.equal(encoded.ratio, 1.5);
        assert.equal(encoded.name, 'foo');
        assert.deepEqual(encoded.tags, ['a']);
        assert.equal(encoded.flag, true);
    });

    test('decoding restores plain values and drops unknown shapes', () => {
        const decoded = decodeProperties({ line: neo4j.int(7), name: 'bar', nested: { a: 1 }, mixed: ['a', 1] });
        assert.deepEqual(decoded, { line: 7, name: 'bar' });
    });
});

describe('groupMutations', () => {
    const batch: GraphBatch = {
        id: 'a.js',
        mutations: [
            { kind: 'node', label: NodeLabel.File, key: 'a.js', props: { path: 'a.js' }, onCreateOnly: false },
            { kind: 'node', label: NodeLabel.Function, key: 'a.js::f', props: { id: 'a.js::f' }, onCreateOnly: false },
            { kind: 'node', label: NodeLabel.Function, key: 'a.js::g', props: { id: 'a.js::g' }, onCreateOnly: false },
            { kind: 'node', label: NodeLabel.Function, key: 'external::h', props: { id: 'external::h' }, onCreateOnly: true },
            {
                kind: 'edge',
                type: EdgeType.CALLS,
                from: { label: NodeLabel.Function, key: 'a.js::f' },
                to: { label: NodeLabel.Function, key: 'a.js::g' },
                props: { line: 1 },
            },
        ],
    };

    test('consecutive rows of one template share a statement', () => {
        const statements = groupMutations(batch);
        assert.equal(statements.length, 4);
        assert.equal(statements[0].query, UPSERT_NODE.File);
        assert.equal(statements[1].query, UPSERT_NODE.Function);
        assert.deepEqual(statements[1].rows.map((row) => row.key), ['a.js::f', 'a.js::g']);
        assert.equal(statements[2].query, ENSURE_NODE.Function);
        assert.deepEqual(statements[3].rows[0].from, 'a.js::f');
        assert.deepEqual(statements[3].rows[0].to, 'a.js::g');
    });

    test('edges outside the schema fail the batch', () => {
        const bad: GraphBatch = {
            id: 'bad.js',
            mutations: [
                {
                    kind: 'edge',
                    type: EdgeType.CALLS,
                    from: { label: NodeLabel.Function, key: 'x' },
                    to: { label: NodeLabel.File, key: 'y' },
                    props: {},
                },
            ],
        };
        assert.throws(() => groupMutations(bad), BatchWriteError);
    });
});

describe('Neo4jGraphStore without a server', () => {
    test('connect without a password fails before dialing', async () => {
        const store = new Neo4jGraphStore(OPTIONS);
        await assert.rejects(store.connect(), InitializationError);
        assert.equal(store.isReady(), false);
    });

    test('reads need a connection', async () => {
        const store = new Neo4jGraphStore({ ...OPTIONS, password: 'test-secret' });
        assert.deepEqual(await store.getFunctions([]), []);
        await assert.rejects(store.getFunctions(['a.js::f']), ConnectivityError);
        await assert.rejects(store.callNeighbours('a.js::f', 0), RangeError);
    });
});
