/**
 * JavaScript Extractor
 *
 * Tree-sitter based extraction of the entity model from one CommonJS source
 * file:
 *   - function definitions (declarations, bound expressions/arrows,
 *     member assignments, methods) with parameters and exact code text
 *   - call expressions, classified and attributed to their enclosing function
 *   - require() imports (assignment, destructured, bare)
 *   - const/let/var declarations with bounded value previews
 *
 * Ownership: a call, require or variable belongs to the nearest enclosing
 * recognized function; with none it is top level.
 */

import type { SyntaxNode } from 'tree-sitter';
import type Parser from 'tree-sitter';
import { createLogger } from '../../common/logger';
import { BUILTIN_ROOTS, PREVIEW_LENGTH, REQUIRE_FUNCTION } from '../config';
import { SyntaxEngine } from '../parser';
import { CALL_QUERY, FUNCTION_QUERY, FunctionPattern, REQUIRE_QUERY, VARIABLE_QUERY } from '../queries';
import {
    CallExpr,
    CodeFile,
    DeclarationKind,
    FunctionEntity,
    FunctionKind,
    ImportBinding,
    ImportKind,
    Parameter,
    Position,
    RequireExpr,
    Variable,
} from '../types';

const log = createLogger('extractor');

/** Node types that open a function scope, recognized or anonymous. */
const FUNCTION_NODE_TYPES = new Set([
    'function_declaration',
    'generator_function_declaration',
    'function_expression',
    'generator_function',
    'arrow_function',
    'method_definition',
]);

const LITERAL_NODE_TYPES = new Set([
    'string',
    'template_string',
    'number',
    'true',
    'false',
    'null',
    'undefined',
    'regex',
]);

export interface ExtractorOptions {
    /** Throw when the tree contains ERROR nodes instead of extracting what parsed */
    rejectSyntaxErrors?: boolean;
}

export class SyntaxErrorInSource extends Error {
    constructor(readonly errorCount: number, readonly firstErrorLine: number) {
        super(`${errorCount} syntax error(s), first at line ${firstErrorLine}`);
        this.name = 'SyntaxErrorInSource';
    }
}

interface FunctionSite {
    name: string;
    kind: FunctionKind;
    definition: SyntaxNode;
    /** The function/arrow/method node itself; scope boundary for ownership */
    body: SyntaxNode;
}

/**
 * Structural key of a node; stable across traversals of the same tree.
 */
export function spanKey(node: SyntaxNode): string {
    return `${node.startIndex}:${node.endIndex}`;
}

export function positionOf(node: SyntaxNode): Position {
    return {
        startLine: node.startPosition.row + 1,
        endLine: node.endPosition.row + 1,
        startCol: node.startPosition.column,
        endCol: node.endPosition.column,
        startByte: node.startIndex,
        endByte: node.endIndex,
    };
}

export function preview(text: string): string {
    const collapsed = text.replace(/\s+/g, ' ').trim();
    return collapsed.length > PREVIEW_LENGTH ? collapsed.slice(0, PREVIEW_LENGTH) + '...' : collapsed;
}

/**
 * Name of an object pattern key; null for computed keys.
 */
function propertyName(key: SyntaxNode): string | null {
    if (key.type === 'property_identifier') return key.text;
    if (key.type === 'string') return stringContent(key);
    return null;
}

function indirect(bindings: ImportBinding[]): ImportBinding[] {
    return bindings.map((binding) => ({ local: binding.local, exported: null }));
}

function stringContent(node: SyntaxNode): string {
    const text = node.text;
    if (text.length >= 2 && /^['"`]/.test(text) && text[text.length - 1] === text[0]) {
        return text.slice(1, -1);
    }
    return text;
}

function captureOf(match: Parser.QueryMatch, name: string): SyntaxNode | undefined {
    return match.captures.find((capture) => capture.name === name)?.node;
}

function sameNode(a: SyntaxNode | null | undefined, b: SyntaxNode): boolean {
    return !!a && a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

function isComment(node: SyntaxNode): boolean {
    return node.type === 'comment';
}

/**
 * Names that `module.exports = {...}`, `module.exports.x =` or `exports.x =`
 * make public. Literal text scan; other export styles are not detected.
 */
export function scanExportedNames(source: string): Set<string> {
    const names = new Set<string>();

    for (const match of source.matchAll(/module\.exports\s*=\s*\{([^}]*)\}/g)) {
        for (const ident of match[1].matchAll(/[A-Za-z_$][\w$]*/g)) {
            names.add(ident[0]);
        }
    }
    for (const match of source.matchAll(/module\.exports\s*=\s*([A-Za-z_$][\w$]*)\s*;?\s*$/gm)) {
        names.add(match[1]);
    }
    for (const match of source.matchAll(/(?:module\.)?exports\.([A-Za-z_$][\w$]*)\s*=/g)) {
        names.add(match[1]);
    }

    return names;
}

export class JavaScriptExtractor {
    private readonly functionQuery: Parser.Query;
    private readonly callQuery: Parser.Query;
    private readonly requireQuery: Parser.Query;
    private readonly variableQuery: Parser.Query;

    /**
     * Compiles all queries up front; a grammar/query mismatch throws
     * InitializationError here rather than on the first file.
     */
    constructor(private readonly engine: SyntaxEngine, private readonly options: ExtractorOptions = {}) {
        this.functionQuery = engine.compileQuery(FUNCTION_QUERY);
        this.callQuery = engine.compileQuery(CALL_QUERY);
        this.requireQuery = engine.compileQuery(REQUIRE_QUERY);
        this.variableQuery = engine.compileQuery(VARIABLE_QUERY);
    }

    public extract(filePath: string, source: string): CodeFile {
        const tree = this.engine.parse(source);
        const root = tree.rootNode;

        const errors = root.descendantsOfType('ERROR');
        if (errors.length > 0) {
            const error = new SyntaxErrorInSource(errors.length, errors[0].startPosition.row + 1);
            if (this.options.rejectSyntaxErrors) {
                throw error;
            }
            log.warn('Extracting file with syntax errors', { file: filePath, detail: error.message });
        }

        const exported = scanExportedNames(source);
        const sites = this.findFunctionSites(root);

        // body span -> owning function name
        const owners = new Map<string, string>();
        const functions = new Map<string, FunctionEntity>();

        for (const site of sites) {
            owners.set(spanKey(site.body), site.name);
            if (functions.has(site.name)) {
                log.debug('Duplicate function name, attributing to first definition', {
                    file: filePath,
                    name: site.name,
                    line: site.definition.startPosition.row + 1,
                });
                continue;
            }
            functions.set(site.name, {
                name: site.name,
                kind: site.kind,
                parameters: this.extractParameters(site.body),
                code: site.definition.text,
                position: positionOf(site.definition),
                calls: [],
                requires: [],
                variables: [],
                isExported: exported.has(site.name),
            });
        }

        const ownerOf = (node: SyntaxNode): string | null => {
            for (let current = node.parent; current; current = current.parent) {
                const owner = owners.get(spanKey(current));
                if (owner !== undefined) return owner;
            }
            return null;
        };

        // Variables belong to the function whose own body declares them. One
        // declared inside an anonymous function nested in a recognized one
        // (undefined here) is not recorded anywhere.
        const variableOwnerOf = (node: SyntaxNode): string | null | undefined => {
            const enclosing = this.enclosingFunction(node);
            if (!enclosing) return null;
            const owner = owners.get(spanKey(enclosing));
            if (owner !== undefined) return owner;
            return ownerOf(enclosing) === null ? null : undefined;
        };

        const file: CodeFile = {
            path: filePath,
            source,
            functions,
            calls: [],
            requires: [],
            variables: [],
        };

        const targetOf = (owner: string | null) => {
            const fn = owner === null ? undefined : functions.get(owner);
            return fn ?? file;
        };

        for (const call of this.extractCalls(root, ownerOf)) {
            targetOf(call.callerContext).calls.push(call);
        }
        for (const req of this.extractRequires(root, ownerOf)) {
            targetOf(req.callerContext).requires.push(req);
        }
        for (const { variable, owner } of this.extractVariables(root, variableOwnerOf, exported)) {
            if (owner === undefined) continue;
            targetOf(owner).variables.push(variable);
        }

        return file;
    }

    // ========================================================================
    // Functions
    // ========================================================================

    private findFunctionSites(root: SyntaxNode): FunctionSite[] {
        const seen = new Set<string>();
        const sites: FunctionSite[] = [];

        for (const match of this.functionQuery.matches(root)) {
            const nameNode = captureOf(match, 'function.name');
            const captured = captureOf(match, 'function.definition');
            if (!nameNode || !captured) continue;

            const site = this.toSite(match.pattern, nameNode, captured, captureOf(match, 'function.value'));
            if (!site) continue;

            const key = spanKey(site.definition);
            if (seen.has(key)) continue;
            seen.add(key);
            sites.push(site);
        }

        return sites.sort((a, b) => a.definition.startIndex - b.definition.startIndex);
    }

    private toSite(
        pattern: number,
        nameNode: SyntaxNode,
        captured: SyntaxNode,
        value: SyntaxNode | undefined
    ): FunctionSite | null {
        const name = nameNode.text;
        switch (pattern) {
            case FunctionPattern.Declaration:
                return { name, kind: 'declaration', definition: captured, body: captured };
            case FunctionPattern.Method:
                return { name, kind: 'method', definition: captured, body: captured };
            case FunctionPattern.VariableBound:
                if (!value) return null;
                return {
                    name,
                    kind: value.type === 'arrow_function' ? 'arrow' : 'expression',
                    definition: this.declarationSpan(captured),
                    body: value,
                };
            case FunctionPattern.MemberAssignment:
                if (!value) return null;
                return {
                    name,
                    kind: value.type === 'arrow_function' ? 'arrow' : 'expression',
                    definition: captured,
                    body: value,
                };
            default:
                return null;
        }
    }

    /**
     * `const f = () => {}` spans the whole declaration statement; a declarator
     * sharing its statement with others keeps its own span.
     */
    private declarationSpan(declarator: SyntaxNode): SyntaxNode {
        const parent = declarator.parent;
        if (!parent || (parent.type !== 'lexical_declaration' && parent.type !== 'variable_declaration')) {
            return declarator;
        }
        const declarators = parent.namedChildren.filter((child) => child.type === 'variable_declarator');
        return declarators.length === 1 ? parent : declarator;
    }

    private extractParameters(fnNode: SyntaxNode): Parameter[] {
        const single = fnNode.childForFieldName('parameter');
        if (single) {
            return [{ name: single.text, index: 0, isRest: false }];
        }

        const list = fnNode.childForFieldName('parameters');
        if (!list) return [];

        return list.namedChildren
            .filter((child) => !isComment(child))
            .map((child, index): Parameter => {
                if (child.type === 'assignment_pattern') {
                    const left = child.childForFieldName('left');
                    const right = child.childForFieldName('right');
                    return {
                        name: left ? left.text : child.text,
                        index,
                        defaultValue: right ? right.text : undefined,
                        isRest: false,
                    };
                }
                if (child.type === 'rest_pattern') {
                    const target = child.namedChildren[0];
                    return { name: target ? target.text : child.text.replace(/^\.\.\./, ''), index, isRest: true };
                }
                return { name: child.text, index, isRest: false };
            });
    }

    // ========================================================================
    // Calls
    // ========================================================================

    private extractCalls(root: SyntaxNode, ownerOf: (node: SyntaxNode) => string | null): CallExpr[] {
        const calls: CallExpr[] = [];
        const seen = new Set<string>();

        for (const match of this.callQuery.matches(root)) {
            const callNode = captureOf(match, 'call.expression');
            const argsNode = captureOf(match, 'call.arguments');
            if (!callNode || !argsNode) continue;

            const key = spanKey(callNode);
            if (seen.has(key)) continue;
            seen.add(key);

            const args = argsNode.namedChildren.filter((child) => !isComment(child)).map((child) => preview(child.text));
            const position = positionOf(callNode);
            const callerContext = ownerOf(callNode);

            const direct = captureOf(match, 'call.target');
            if (direct) {
                if (direct.type === 'identifier' && direct.text === REQUIRE_FUNCTION) continue;
                calls.push({ name: direct.text, arguments: args, position, isMemberAccess: false, callerContext });
                continue;
            }

            const property = captureOf(match, 'call.target.member');
            const member = captureOf(match, 'call.target.expression');
            if (!property || !member) continue;

            const receiver = this.rootReceiver(member);
            if (receiver !== undefined && BUILTIN_ROOTS.has(receiver)) continue;

            calls.push({
                name: property.text,
                arguments: args,
                position,
                isMemberAccess: true,
                receiver,
                callerContext,
            });
        }

        return calls.sort((a, b) => a.position.startByte - b.position.startByte);
    }

    /**
     * Innermost object of a member chain: `api` for `api.client.get`,
     * `this` for `this.items.push`. Undefined when the chain starts at an
     * expression rather than a name.
     */
    private rootReceiver(member: SyntaxNode): string | undefined {
        let current: SyntaxNode | null = member;
        while (current) {
            if (current.type === 'member_expression') {
                current = current.childForFieldName('object');
            } else if (current.type === 'call_expression') {
                current = current.childForFieldName('function');
            } else if (current.type === 'parenthesized_expression') {
                current = current.namedChildren[0] ?? null;
            } else {
                break;
            }
        }
        if (!current) return undefined;
        if (current.type === 'identifier' || current.type === 'this' || current.type === 'super') {
            return current.text;
        }
        return undefined;
    }

    // ========================================================================
    // Imports
    // ========================================================================

    private extractRequires(root: SyntaxNode, ownerOf: (node: SyntaxNode) => string | null): RequireExpr[] {
        const requires: RequireExpr[] = [];
        const seen = new Set<string>();

        for (const match of this.requireQuery.matches(root)) {
            const callNode = captureOf(match, 'require.call');
            const pathNode = captureOf(match, 'require.path');
            if (!callNode || !pathNode) continue;

            const key = spanKey(callNode);
            if (seen.has(key)) continue;
            seen.add(key);

            const moduleName = stringContent(pathNode);
            if (moduleName.length === 0) continue;

            const binding = this.classifyBinding(callNode);
            requires.push({
                moduleName,
                variableName: binding.variableName,
                bindings: binding.bindings,
                imported: binding.imported,
                importKind: binding.kind,
                position: positionOf(callNode),
                callerContext: ownerOf(callNode),
            });
        }

        return requires.sort((a, b) => a.position.startByte - b.position.startByte);
    }

    private classifyBinding(callNode: SyntaxNode): {
        kind: ImportKind;
        variableName?: string;
        bindings: string[];
        imported: ImportBinding[];
    } {
        const bare = { kind: 'bare' as const, bindings: [], imported: [] };
        const declarator = callNode.parent;
        if (!declarator || declarator.type !== 'variable_declarator' || !sameNode(declarator.childForFieldName('value'), callNode)) {
            return bare;
        }

        const nameNode = declarator.childForFieldName('name');
        if (!nameNode) {
            return bare;
        }
        if (nameNode.type === 'identifier') {
            return { kind: 'assignment', variableName: nameNode.text, bindings: [nameNode.text], imported: [] };
        }
        const imported = this.patternBindings(nameNode);
        return { kind: 'destructured', bindings: imported.map((binding) => binding.local), imported };
    }

    /**
     * Local names bound by a destructuring pattern, in source order, each
     * with the module property it reads when that is a direct property.
     */
    private patternBindings(node: SyntaxNode, exported: string | null = null): ImportBinding[] {
        switch (node.type) {
            case 'identifier':
                return [{ local: node.text, exported }];
            case 'shorthand_property_identifier_pattern':
                return [{ local: node.text, exported: node.text }];
            case 'object_pattern':
                return node.namedChildren.flatMap((child) => this.patternBindings(child));
            case 'array_pattern':
                return node.namedChildren.flatMap((child) => indirect(this.patternBindings(child)));
            case 'pair_pattern': {
                const key = node.childForFieldName('key');
                const value = node.childForFieldName('value');
                if (!value) return [];
                const property = key ? propertyName(key) : null;
                return value.type === 'identifier' || value.type === 'assignment_pattern'
                    ? this.patternBindings(value, property)
                    : indirect(this.patternBindings(value));
            }
            case 'object_assignment_pattern':
            case 'assignment_pattern': {
                const left = node.childForFieldName('left');
                return left ? this.patternBindings(left, exported) : [];
            }
            case 'rest_pattern': {
                const target = node.namedChildren[0];
                return target ? indirect(this.patternBindings(target)) : [];
            }
            default:
                return [];
        }
    }

    // ========================================================================
    // Variables
    // ========================================================================

    private extractVariables(
        root: SyntaxNode,
        ownerOf: (node: SyntaxNode) => string | null | undefined,
        exported: Set<string>
    ): Array<{ variable: Variable; owner: string | null | undefined }> {
        const found: Array<{ variable: Variable; owner: string | null | undefined }> = [];
        const seen = new Set<string>();

        for (const match of this.variableQuery.matches(root)) {
            const declaration = captureOf(match, 'variable.declaration');
            const declarator = captureOf(match, 'variable.declarator');
            const nameNode = captureOf(match, 'variable.name');
            if (!declaration || !declarator || !nameNode) continue;

            const key = spanKey(declarator);
            if (seen.has(key)) continue;
            seen.add(key);

            const kind = this.declarationKind(declaration);
            if (!kind) continue;

            const value = declarator.childForFieldName('value');
            found.push({
                variable: {
                    name: nameNode.text,
                    kind,
                    valuePreview: value ? this.valuePreview(value) : undefined,
                    position: positionOf(declarator),
                    scope: this.enclosingFunction(declarator) ? 'local' : 'global',
                    isExported: exported.has(nameNode.text),
                },
                owner: ownerOf(declarator),
            });
        }

        return found.sort((a, b) => a.variable.position.startByte - b.variable.position.startByte);
    }

    private declarationKind(declaration: SyntaxNode): DeclarationKind | null {
        const keyword = declaration.firstChild?.text;
        return keyword === 'const' || keyword === 'let' || keyword === 'var' ? keyword : null;
    }

    private valuePreview(value: SyntaxNode): string {
        if (LITERAL_NODE_TYPES.has(value.type)) return preview(value.text);
        if (value.type === 'object') return 'object';
        if (value.type === 'array') return 'array';
        return `<${value.type}>`;
    }

    /**
     * Nearest function, arrow or method node around `node`, recognized or not.
     */
    private enclosingFunction(node: SyntaxNode): SyntaxNode | null {
        for (let current = node.parent; current; current = current.parent) {
            if (FUNCTION_NODE_TYPES.has(current.type)) return current;
        }
        return null;
    }
}
