/**
 * Import and call-target resolution for the graph builder.
 *
 * Call targets are resolved heuristically:
 *   1. a function of the same name in the calling file (no shadowing check)
 *   2. a function of that name in a file the caller binds through a relative
 *      require (`const { fn } = require('./x')`, `const { fn: f } = ...` then
 *      `f()`, or `x.fn()` after `const x = require('./x')`)
 *   3. otherwise an external stub
 */

import * as fs from 'fs';
import * as path from 'path';
import { RESOLVABLE_EXTENSIONS } from '../parser/config';
import { CallExpr, RequireExpr } from '../parser/types';
import { externalKey, functionKey, isRelativeModule, normalizePath } from './utils';

export class LocalImportResolver {
    private readonly cache = new Map<string, string | null>();

    constructor(
        private readonly root: string,
        private readonly extensions: readonly string[] = RESOLVABLE_EXTENSIONS
    ) {}

    /**
     * Resolve a relative module string against the importing file. Tries the
     * literal path, then each extension appended, then `index.<ext>` inside a
     * directory. Returns a root-relative path or null.
     */
    public resolve(fromFile: string, moduleName: string): string | null {
        if (!isRelativeModule(moduleName)) return null;

        const base = normalizePath(path.join(path.dirname(fromFile), moduleName));
        if (base.startsWith('../')) return null;

        const cached = this.cache.get(base);
        if (cached !== undefined) return cached;

        const candidates = [
            base,
            ...this.extensions.map((ext) => base + ext),
            ...this.extensions.map((ext) => `${base}/index${ext}`),
        ];
        const resolved = candidates.find((candidate) => this.isFile(candidate)) ?? null;
        this.cache.set(base, resolved);
        return resolved;
    }

    private isFile(relativePath: string): boolean {
        try {
            return fs.statSync(path.join(this.root, relativePath)).isFile();
        } catch {
            return false;
        }
    }
}

/**
 * File path -> names of the functions it defines, for the files being built.
 */
export type CorpusIndex = ReadonlyMap<string, ReadonlySet<string>>;

export interface CallScope {
    filePath: string;
    localFunctions: ReadonlySet<string>;
    /** Requires visible to the call: the file's top-level ones plus the caller's own */
    requires: readonly RequireExpr[];
}

export class CallTargetResolver {
    constructor(private readonly imports: LocalImportResolver, private readonly corpus: CorpusIndex) {}

    public resolve(call: CallExpr, scope: CallScope): string {
        if (scope.localFunctions.has(call.name)) {
            return functionKey(scope.filePath, call.name);
        }
        return this.resolveImported(call, scope) ?? externalKey(call.name);
    }

    private resolveImported(call: CallExpr, scope: CallScope): string | null {
        for (const req of scope.requires) {
            const exported = this.exportedName(call, req);
            if (exported === null) continue;

            const target = this.imports.resolve(scope.filePath, req.moduleName);
            if (target && this.corpus.get(target)?.has(exported)) {
                return functionKey(target, exported);
            }
        }
        return null;
    }

    /**
     * Name the call reads from the required module: the member name for
     * `x.fn()`, the destructured property for `fn()` (`b` in `{ b: fn }`).
     */
    private exportedName(call: CallExpr, req: RequireExpr): string | null {
        if (call.isMemberAccess) {
            return req.importKind === 'assignment' && req.variableName === call.receiver ? call.name : null;
        }
        if (req.importKind !== 'destructured') return null;
        return req.imported.find((binding) => binding.local === call.name)?.exported ?? null;
    }
}
