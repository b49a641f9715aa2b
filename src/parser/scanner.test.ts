/**
 * Corpus Scanner Tests
 */

import { strict as assert } from 'assert';
import { test, describe, before, after } from 'node:test';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { JavaScriptExtractor } from './javascript/extractor';
import { createJavaScriptEngine } from './parser';
import { Scanner, walkSourceFiles } from './scanner';

interface TestWorkspace {
    root: string;
    cleanup: () => void;
}

function createTestWorkspace(): TestWorkspace {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'graphrag-scanner-test-'));

    fs.mkdirSync(path.join(root, 'lib', 'nested'), { recursive: true });
    fs.mkdirSync(path.join(root, 'node_modules', 'dep'), { recursive: true });

    fs.writeFileSync(path.join(root, 'main.js'), "const lib = require('./lib/util');\nlib.go();\n");
    fs.writeFileSync(path.join(root, 'lib', 'util.js'), 'function go() { return 1; }\nmodule.exports = { go };\n');
    fs.writeFileSync(path.join(root, 'lib', 'nested', 'deep.js'), 'const x = 1;\n');
    fs.writeFileSync(path.join(root, 'lib', 'notes.md'), '# not code\n');
    fs.writeFileSync(path.join(root, 'node_modules', 'dep', 'index.js'), 'function vendored() {}\n');
    fs.writeFileSync(path.join(root, 'broken.js'), 'function ok() {}\nlet x = );\n');

    return {
        root,
        cleanup: () => {
            fs.rmSync(root, { recursive: true, force: true });
        },
    };
}

describe('walkSourceFiles', () => {
    let workspace: TestWorkspace;

    before(() => {
        workspace = createTestWorkspace();
    });

    after(() => {
        workspace.cleanup();
    });

    test('lists matching files sorted, skipping ignored folders', async () => {
        const files = await walkSourceFiles(workspace.root, ['.js']);
        assert.deepEqual(files, ['broken.js', 'lib/nested/deep.js', 'lib/util.js', 'main.js']);
    });

    test('honours the extension filter', async () => {
        assert.deepEqual(await walkSourceFiles(workspace.root, ['.md']), ['lib/notes.md']);
    });

    test('missing directory yields nothing', async () => {
        assert.deepEqual(await walkSourceFiles(path.join(workspace.root, 'absent'), ['.js']), []);
    });
});

describe('Scanner', () => {
    let workspace: TestWorkspace;
    const engine = createJavaScriptEngine();

    before(() => {
        workspace = createTestWorkspace();
    });

    after(() => {
        workspace.cleanup();
    });

    test('extracts every file in path order', async () => {
        const scanner = new Scanner(new JavaScriptExtractor(engine), { concurrency: 2 });
        const result = await scanner.extractDirectory(workspace.root);

        assert.deepEqual(result.files.map((file) => file.path), ['broken.js', 'lib/nested/deep.js', 'lib/util.js', 'main.js']);
        assert.deepEqual(result.failures, []);
        const util = result.files[2];
        assert.ok(util.functions.has('go'));
        assert.equal(util.functions.get('go')?.isExported, true);
    });

    test('rejected files become failures and the scan continues', async () => {
        const scanner = new Scanner(new JavaScriptExtractor(engine, { rejectSyntaxErrors: true }));
        const result = await scanner.extractDirectory(workspace.root);

        assert.equal(result.files.length, 3);
        assert.equal(result.failures.length, 1);
        assert.equal(result.failures[0].path, 'broken.js');
        assert.match(result.failures[0].reason, /^parse failed: \d+ syntax error\(s\), first at line 2$/);
    });

    test('unreadable file is reported', async () => {
        const scanner = new Scanner(new JavaScriptExtractor(engine));
        const outcome = await scanner.extractFile(workspace.root, 'gone.js');
        assert.ok('reason' in outcome);
        assert.match(outcome.reason, /^read failed: /);
    });

    test('missing root gives an empty result', async () => {
        const scanner = new Scanner(new JavaScriptExtractor(engine));
        const result = await scanner.extractDirectory(path.join(workspace.root, 'absent'));
        assert.deepEqual(result, { files: [], failures: [] });
    });
});
