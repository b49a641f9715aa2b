/**
 * Corpus scanner: walks a directory, extracts every source file and
 * collects per-file failures instead of aborting.
 *
 * Extraction of one file is a pure function of its contents, so files are
 * processed with bounded concurrency; the result is sorted by path so its
 * order does not depend on completion order.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { createLogger, errorMessage } from '../common/logger';
import { normalizePath } from '../graph/utils';
import { DEFAULT_SOURCE_EXTENSIONS, hasSourceExtension, IGNORED_FOLDERS } from './config';
import { JavaScriptExtractor } from './javascript/extractor';
import { CodeFile, ExtractionFailure, ExtractionResult } from './types';

const log = createLogger('scanner');

export interface ScannerOptions {
    extensions?: readonly string[];
    concurrency?: number;
}

/**
 * Recursively lists files under `root` with one of `extensions`, as
 * root-relative forward-slash paths in sorted order. A missing root yields [].
 */
export async function walkSourceFiles(root: string, extensions: readonly string[]): Promise<string[]> {
    const found: string[] = [];

    const visit = async (dir: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(dir, { withFileTypes: true });
        } catch (error) {
            if (dir === root) {
                log.warn('Directory not readable, nothing to scan', { dir, error: errorMessage(error) });
            } else {
                log.warn('Skipping unreadable directory', { dir, error: errorMessage(error) });
            }
            return;
        }

        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!IGNORED_FOLDERS.has(entry.name)) {
                    await visit(fullPath);
                }
            } else if (entry.isFile() && hasSourceExtension(entry.name, extensions)) {
                found.push(normalizePath(path.relative(root, fullPath)));
            }
        }
    };

    await visit(root);
    return found.sort();
}

export class Scanner {
    private readonly extensions: readonly string[];
    private readonly concurrency: number;

    constructor(private readonly extractor: JavaScriptExtractor, options: ScannerOptions = {}) {
        this.extensions = options.extensions ?? DEFAULT_SOURCE_EXTENSIONS;
        this.concurrency = options.concurrency ?? 8;
    }

    /**
     * Extract one file. Read and parse errors become an ExtractionFailure.
     */
    public async extractFile(root: string, relativePath: string): Promise<CodeFile | ExtractionFailure> {
        let source: string;
        try {
            source = await fs.readFile(path.join(root, relativePath), 'utf-8');
        } catch (error) {
            return { path: relativePath, reason: `read failed: ${errorMessage(error)}` };
        }

        try {
            return this.extractor.extract(relativePath, source);
        } catch (error) {
            return { path: relativePath, reason: `parse failed: ${errorMessage(error)}` };
        }
    }

    public async extractDirectory(root: string): Promise<ExtractionResult> {
        const paths = await walkSourceFiles(root, this.extensions);
        const limit = pLimit(this.concurrency);

        const outcomes = await log.time(
            'Extracted corpus',
            () => Promise.all(paths.map((relativePath) => limit(() => this.extractFile(root, relativePath)))),
            { root, files: paths.length }
        );

        const files: CodeFile[] = [];
        const failures: ExtractionFailure[] = [];
        for (const outcome of outcomes) {
            if ('reason' in outcome) {
                log.warn('Skipping file', { file: outcome.path, reason: outcome.reason });
                failures.push(outcome);
            } else {
                files.push(outcome);
            }
        }

        if (failures.length > 0) {
            log.warn('Some files could not be extracted', { failed: failures.length, extracted: files.length });
        }

        return { files, failures };
    }
}
