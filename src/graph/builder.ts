/**
 * Graph Builder
 *
 * Projects CodeFile entities into graph mutations. Every node is merged by
 * its key and every edge by (type, from, to), so building the same corpus
 * again converges to the same graph.
 *
 * Per file, in order:
 *   1. File node
 *   2. Module nodes + REQUIRES for top-level imports
 *   3. per function: Function + CONTAINS, Parameters, REQUIRES, CALLS, Variables
 *   4. top-level CALLS and DEFINES_VAR from the File
 *   5. DEPENDS_ON for relative imports that resolve to a file
 * After all files: DEPENDS_ON strength recomputed from cross-file CALLS.
 */

import * as path from 'path';
import { createLogger, errorMessage } from '../common/logger';
import { CallExpr, CodeFile, FunctionEntity, RequireExpr, Variable } from '../parser/types';
import { CallScope, CallTargetResolver, CorpusIndex, LocalImportResolver } from './resolution';
import { EdgeType, NodeLabel } from './schema';
import { GraphBatch, GraphMutation, GraphWriter, NodeRef, Properties, PropertyValue } from './types';
import { functionKey, isRelativeModule, parameterKey, parseFunctionKey, variableKey } from './utils';

const log = createLogger('graph:builder');

const TOP_LEVEL_CONTEXT = 'top-level';
const SUMMARY_NAME_LIMIT = 8;

export interface BuildReport {
    /** True when the store was not ready and nothing was written */
    skipped: boolean;
    committed: string[];
    failed: Array<{ file: string; reason: string }>;
    mutations: number;
    dependenciesRecomputed: boolean;
}

/**
 * Drops undefined values; graph properties cannot hold them.
 */
function props(values: Record<string, PropertyValue | undefined>): Properties {
    const result: Properties = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}

export function buildCorpusIndex(files: readonly CodeFile[]): CorpusIndex {
    return new Map(files.map((file) => [file.path, new Set(file.functions.keys())]));
}

/**
 * Lines of text; a final newline ends the last line rather than opening one.
 */
export function countLines(source: string): number {
    if (source.length === 0) return 0;
    const segments = source.split('\n');
    return source.endsWith('\n') ? segments.length - 1 : segments.length;
}

function summarize(file: CodeFile): string {
    const names = [...file.functions.keys()];
    const shown = names.slice(0, SUMMARY_NAME_LIMIT).join(', ');
    const more = names.length > SUMMARY_NAME_LIMIT ? `, +${names.length - SUMMARY_NAME_LIMIT} more` : '';
    const modules = [...new Set(file.requires.map((req) => req.moduleName))];
    const parts = [`${names.length} function(s)${names.length > 0 ? `: ${shown}${more}` : ''}`];
    if (modules.length > 0) {
        parts.push(`requires ${modules.join(', ')}`);
    }
    return parts.join('; ');
}

/**
 * Accumulates one file's mutations in build order.
 */
class BatchPlan {
    readonly mutations: GraphMutation[] = [];

    upsert(label: NodeLabel, key: string, values: Properties): NodeRef {
        this.mutations.push({ kind: 'node', label, key, props: values, onCreateOnly: false });
        return { label, key };
    }

    ensure(label: NodeLabel, key: string, values: Properties): NodeRef {
        this.mutations.push({ kind: 'node', label, key, props: values, onCreateOnly: true });
        return { label, key };
    }

    link(type: EdgeType, from: NodeRef, to: NodeRef, values: Properties = {}): void {
        this.mutations.push({ kind: 'edge', type, from, to, props: values });
    }
}

export class GraphBuilder {
    constructor(
        private readonly store: GraphWriter,
        private readonly imports: LocalImportResolver
    ) {}

    /**
     * Write every file as its own batch. A failing batch is reported and the
     * remaining files still go through; committed batches are kept.
     */
    public async build(files: readonly CodeFile[]): Promise<BuildReport> {
        const report: BuildReport = {
            skipped: false,
            committed: [],
            failed: [],
            mutations: 0,
            dependenciesRecomputed: false,
        };

        if (!this.store.isReady()) {
            log.warn('Graph store not connected, skipping build', { files: files.length });
            return { ...report, skipped: true };
        }

        const corpus = buildCorpusIndex(files);
        for (const file of files) {
            const batch = this.buildFile(file, corpus);
            try {
                await this.store.applyBatch(batch);
                report.committed.push(file.path);
                report.mutations += batch.mutations.length;
                log.debug('Batch committed', { file: file.path, mutations: batch.mutations.length });
            } catch (error) {
                report.failed.push({ file: file.path, reason: errorMessage(error) });
                log.error('Batch failed', { file: file.path, error: errorMessage(error) });
            }
        }

        try {
            await this.store.recomputeDependencies();
            report.dependenciesRecomputed = true;
        } catch (error) {
            log.error('Dependency aggregation failed', { error: errorMessage(error) });
        }

        log.info('Graph build finished', {
            committed: report.committed.length,
            failed: report.failed.length,
            mutations: report.mutations,
        });
        return report;
    }

    /**
     * Mutations for one file. `corpus` lists the functions of every file in
     * the current build and enables cross-file call targets.
     */
    public buildFile(file: CodeFile, corpus: CorpusIndex = buildCorpusIndex([file])): GraphBatch {
        const plan = new BatchPlan();
        const calls = new CallTargetResolver(this.imports, corpus);
        const localFunctions = new Set(file.functions.keys());

        // 1. File
        const fileRef = plan.upsert(NodeLabel.File, file.path, props({
            path: file.path,
            name: path.posix.basename(file.path),
            language: 'javascript',
            lineCount: countLines(file.source),
            size: Buffer.byteLength(file.source, 'utf8'),
            functionCount: file.functions.size,
            summary: summarize(file),
        }));

        // 2. Top-level imports
        this.addRequires(plan, fileRef, file.requires);

        // 3. Functions
        for (const fn of file.functions.values()) {
            const fnRef = this.addFunction(plan, fileRef, file, fn);
            this.addRequires(plan, fnRef, fn.requires);
            this.addCalls(plan, fnRef, fn.calls, calls, {
                filePath: file.path,
                localFunctions,
                requires: [...file.requires, ...fn.requires],
            });
            this.addVariables(plan, fnRef, fn.variables);
        }

        // 4. Top-level calls and variables
        this.addCalls(plan, fileRef, file.calls, calls, {
            filePath: file.path,
            localFunctions,
            requires: file.requires,
        });
        this.addVariables(plan, fileRef, file.variables);

        // 5. Local import dependencies
        const dependencies = new Set<string>();
        for (const req of file.requires) {
            if (!isRelativeModule(req.moduleName)) continue;
            const target = this.imports.resolve(file.path, req.moduleName);
            if (!target || target === file.path || dependencies.has(target)) continue;
            dependencies.add(target);

            const targetRef = plan.ensure(NodeLabel.File, target, { path: target, name: path.posix.basename(target) });
            plan.link(EdgeType.DEPENDS_ON, fileRef, targetRef, { viaImport: true });
        }

        return { id: file.path, mutations: plan.mutations };
    }

    private addFunction(plan: BatchPlan, fileRef: NodeRef, file: CodeFile, fn: FunctionEntity): NodeRef {
        const key = functionKey(file.path, fn.name);
        const fnRef = plan.upsert(NodeLabel.Function, key, props({
            id: key,
            name: fn.name,
            filePath: file.path,
            kind: fn.kind,
            startLine: fn.position.startLine,
            endLine: fn.position.endLine,
            startCol: fn.position.startCol,
            endCol: fn.position.endCol,
            startByte: fn.position.startByte,
            endByte: fn.position.endByte,
            code: fn.code,
            parameterCount: fn.parameters.length,
            isExported: fn.isExported,
            external: false,
        }));
        plan.link(EdgeType.CONTAINS, fileRef, fnRef);

        for (const param of fn.parameters) {
            const paramKey = parameterKey(key, param.index);
            const paramRef = plan.upsert(NodeLabel.Parameter, paramKey, props({
                id: paramKey,
                name: param.name,
                index: param.index,
                defaultValue: param.defaultValue,
                isRest: param.isRest,
                functionId: key,
            }));
            plan.link(EdgeType.HAS_PARAMETER, fnRef, paramRef, { index: param.index });
        }

        return fnRef;
    }

    private addRequires(plan: BatchPlan, ownerRef: NodeRef, requires: readonly RequireExpr[]): void {
        for (const req of requires) {
            const moduleRef = plan.upsert(NodeLabel.Module, req.moduleName, {
                name: req.moduleName,
                isLocal: isRelativeModule(req.moduleName),
            });
            plan.link(EdgeType.REQUIRES, ownerRef, moduleRef, props({
                variableName: req.variableName,
                bindings: req.bindings,
                importKind: req.importKind,
                line: req.position.startLine,
            }));
        }
    }

    /**
     * One CALLS edge per (caller, target). The first call site supplies the
     * line, arguments and context; callCount is the number of call sites.
     */
    private addCalls(
        plan: BatchPlan,
        callerRef: NodeRef,
        callsToAdd: readonly CallExpr[],
        resolver: CallTargetResolver,
        scope: CallScope
    ): void {
        const grouped = new Map<string, { first: CallExpr; count: number }>();
        for (const call of callsToAdd) {
            const target = resolver.resolve(call, scope);
            const entry = grouped.get(target);
            if (entry) {
                entry.count += 1;
            } else {
                grouped.set(target, { first: call, count: 1 });
            }
        }

        for (const [target, { first, count }] of grouped) {
            const defined = parseFunctionKey(target);
            const targetRef = plan.ensure(NodeLabel.Function, target, props({
                id: target,
                name: first.name,
                filePath: defined?.filePath,
                external: defined === null,
            }));
            plan.link(EdgeType.CALLS, callerRef, targetRef, props({
                line: first.position.startLine,
                arguments: first.arguments,
                context: first.callerContext ?? TOP_LEVEL_CONTEXT,
                isMemberAccess: first.isMemberAccess,
                callCount: count,
            }));
        }
    }

    private addVariables(plan: BatchPlan, ownerRef: NodeRef, variables: readonly Variable[]): void {
        for (const variable of variables) {
            const key = variableKey(ownerRef.key, variable.name);
            const varRef = plan.upsert(NodeLabel.Variable, key, props({
                id: key,
                name: variable.name,
                kind: variable.kind,
                valuePreview: variable.valuePreview,
                scope: variable.scope,
                line: variable.position.startLine,
                isExported: variable.isExported,
            }));
            plan.link(EdgeType.DEFINES_VAR, ownerRef, varRef);
        }
    }
}
