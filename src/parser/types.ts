/**
 * Entity model produced by the structural extractor.
 *
 * Lines are 1-based, columns 0-based; byte offsets index the source text
 * so that `source.slice(startByte, endByte)` is the node's text.
 */

export interface Position {
    startLine: number;
    endLine: number;
    startCol: number;
    endCol: number;
    startByte: number;
    endByte: number;
}

export interface CallExpr {
    /** Identifier for plain calls, property name for member calls */
    name: string;
    arguments: string[];
    position: Position;
    isMemberAccess: boolean;
    /** Root object of a member call (`api` in `api.client.get()`) */
    receiver?: string;
    /** Enclosing function name, null at top level */
    callerContext: string | null;
}

export type ImportKind = 'assignment' | 'destructured' | 'bare';

/**
 * One local name bound by a destructured require. `exported` is the
 * property it reads from the module (`b` for `{ b: c }`), or null when the
 * name comes from a nested, array or rest pattern.
 */
export interface ImportBinding {
    local: string;
    exported: string | null;
}

export interface RequireExpr {
    moduleName: string;
    /** Only set for `const x = require(...)` */
    variableName?: string;
    /** Names bound by `const { a, b: c } = require(...)` */
    bindings: string[];
    /** The destructured bindings with their exported names; empty otherwise */
    imported: ImportBinding[];
    importKind: ImportKind;
    position: Position;
    callerContext: string | null;
}

export type DeclarationKind = 'const' | 'let' | 'var';

export type VariableScope = 'global' | 'local';

export interface Variable {
    name: string;
    kind: DeclarationKind;
    valuePreview?: string;
    position: Position;
    scope: VariableScope;
    isExported: boolean;
}

export interface Parameter {
    name: string;
    index: number;
    defaultValue?: string;
    isRest: boolean;
}

export type FunctionKind = 'declaration' | 'expression' | 'arrow' | 'method';

export interface FunctionEntity {
    name: string;
    kind: FunctionKind;
    parameters: Parameter[];
    /** Exact text of the definition node */
    code: string;
    position: Position;
    calls: CallExpr[];
    requires: RequireExpr[];
    variables: Variable[];
    isExported: boolean;
}

export interface CodeFile {
    /** Root-relative path with forward slashes */
    path: string;
    source: string;
    functions: Map<string, FunctionEntity>;
    calls: CallExpr[];
    requires: RequireExpr[];
    variables: Variable[];
}

export interface ExtractionFailure {
    path: string;
    reason: string;
}

export interface ExtractionResult {
    files: CodeFile[];
    failures: ExtractionFailure[];
}
