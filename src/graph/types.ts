import type { FunctionKind } from '../parser/types';
import type { EdgeType, NodeLabel } from './schema';

export type PropertyValue = string | number | boolean | string[];

export type Properties = Record<string, PropertyValue>;

export interface NodeRef {
    label: NodeLabel;
    key: string;
}

export interface NodeMutation {
    kind: 'node';
    label: NodeLabel;
    key: string;
    props: Properties;
    /** Only set properties when the node does not exist yet */
    onCreateOnly: boolean;
}

export interface EdgeMutation {
    kind: 'edge';
    type: EdgeType;
    from: NodeRef;
    to: NodeRef;
    props: Properties;
}

export type GraphMutation = NodeMutation | EdgeMutation;

/**
 * Ordered mutations for one file, committed as one transaction.
 */
export interface GraphBatch {
    id: string;
    mutations: GraphMutation[];
}

// ============================================================================
// Read model
// ============================================================================

export interface FunctionHit {
    kind: 'function';
    id: string;
    name: string;
    filePath: string;
    startLine: number;
    endLine: number;
    functionKind?: FunctionKind;
    code?: string;
    hops?: number;
}

/**
 * A file reached through one of its top-level CALLS edges; `startLine` is
 * the line of that call site when known.
 */
export interface FileHit {
    kind: 'file';
    id: string;
    filePath: string;
    startLine: number;
    hops?: number;
}

export type GraphHit = FunctionHit | FileHit;

export interface GraphStats {
    nodes: number;
    edges: number;
    byLabel: Record<string, number>;
    byType: Record<string, number>;
}

// ============================================================================
// Store contracts
// ============================================================================

export interface GraphWriter {
    /** False until connected; writes against a store that is not ready are no-ops */
    isReady(): boolean;
    applyBatch(batch: GraphBatch): Promise<void>;
    recomputeDependencies(): Promise<void>;
}

export interface GraphReader {
    getFunctions(ids: readonly string[]): Promise<FunctionHit[]>;
    callNeighbours(id: string, maxHops: number): Promise<GraphHit[]>;
    siblingFunctions(id: string): Promise<FunctionHit[]>;
    sharedDependencyFunctions(id: string): Promise<FunctionHit[]>;
}

export interface GraphStore extends GraphWriter, GraphReader {
    stats(): Promise<GraphStats>;
    clear(): Promise<void>;
    close(): Promise<void>;
}
