import type { FunctionKind } from '../../parser/types';
import { NodeLabel } from '../schema';
import type { FunctionHit, GraphHit, Properties, PropertyValue } from '../types';

const FUNCTION_KINDS: readonly string[] = ['declaration', 'expression', 'arrow', 'method'];

function isFunctionKind(value: PropertyValue | undefined): value is FunctionKind {
    return typeof value === 'string' && FUNCTION_KINDS.includes(value);
}

function text(value: PropertyValue | undefined): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function int(value: PropertyValue | undefined): number | undefined {
    return typeof value === 'number' ? value : undefined;
}

/**
 * Read-model view of a Function node. Returns null for nodes without an id.
 */
export function toFunctionHit(nodeProps: Properties, hops?: number): FunctionHit | null {
    const id = text(nodeProps.id);
    if (!id) return null;

    const kind = nodeProps.kind;
    return {
        kind: 'function',
        id,
        name: text(nodeProps.name) ?? id,
        filePath: text(nodeProps.filePath) ?? '',
        startLine: int(nodeProps.startLine) ?? 0,
        endLine: int(nodeProps.endLine) ?? 0,
        functionKind: isFunctionKind(kind) ? kind : undefined,
        code: text(nodeProps.code),
        hops,
    };
}

/**
 * Read-model view of a Function or File node reached by traversal. A File
 * hit starts at the line of the CALLS edge it was reached through, or 1.
 */
export function toGraphHit(
    labels: readonly string[],
    nodeProps: Properties,
    viaLine: number | null,
    hops?: number
): GraphHit | null {
    if (labels.includes(NodeLabel.File)) {
        const filePath = text(nodeProps.path);
        if (!filePath) return null;
        return { kind: 'file', id: filePath, filePath, startLine: viaLine ?? 1, hops };
    }
    if (labels.includes(NodeLabel.Function)) {
        return toFunctionHit(nodeProps, hops);
    }
    return null;
}
