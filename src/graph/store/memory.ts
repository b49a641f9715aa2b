/**
 * In-process GraphStore.
 *
 * Holds nodes and edges in maps and answers the same relations as the
 * Cypher statements in schema.ts. Each batch is applied to a staged copy
 * that replaces the live graph only when every mutation succeeded.
 */

import { BatchWriteError } from '../../common/errors';
import { createLogger } from '../../common/logger';
import { assertHopBound, EdgeType, isAllowedEdge, NodeLabel } from '../schema';
import {
    EdgeMutation,
    FunctionHit,
    GraphBatch,
    GraphHit,
    GraphStats,
    GraphStore,
    NodeMutation,
    NodeRef,
    Properties,
} from '../types';
import { toFunctionHit, toGraphHit } from './hits';

const log = createLogger('graph:memory');

export interface StoredNode {
    label: NodeLabel;
    key: string;
    props: Properties;
}

export interface StoredEdge {
    type: EdgeType;
    from: string;
    to: string;
    props: Properties;
}

interface GraphState {
    nodes: Map<string, StoredNode>;
    edges: Map<string, StoredEdge>;
}

function nodeId(ref: NodeRef): string {
    return `${ref.label}:${ref.key}`;
}

function edgeId(type: EdgeType, from: string, to: string): string {
    return JSON.stringify([type, from, to]);
}

function copyState(state: GraphState): GraphState {
    const nodes = new Map<string, StoredNode>();
    for (const [id, node] of state.nodes) nodes.set(id, { ...node, props: { ...node.props } });
    const edges = new Map<string, StoredEdge>();
    for (const [id, edge] of state.edges) edges.set(id, { ...edge, props: { ...edge.props } });
    return { nodes, edges };
}

export class InMemoryGraphStore implements GraphStore {
    private state: GraphState = { nodes: new Map(), edges: new Map() };
    private open = true;

    public isReady(): boolean {
        return this.open;
    }

    public async applyBatch(batch: GraphBatch): Promise<void> {
        const staged = copyState(this.state);
        for (const mutation of batch.mutations) {
            if (mutation.kind === 'node') {
                this.applyNode(staged, mutation);
            } else {
                this.applyEdge(staged, mutation, batch.id);
            }
        }
        this.state = staged;
    }

    public async recomputeDependencies(): Promise<void> {
        const strength = new Map<string, { from: string; to: string; count: number }>();
        const fileOf = this.containsIndex();

        for (const edge of this.state.edges.values()) {
            if (edge.type === EdgeType.DEPENDS_ON) {
                edge.props.strength = 0;
                continue;
            }
            if (edge.type !== EdgeType.CALLS) continue;

            const source = this.isLabel(edge.from, NodeLabel.File) ? edge.from : fileOf.get(edge.from);
            const target = fileOf.get(edge.to);
            if (!source || !target || source === target) continue;

            const id = edgeId(EdgeType.DEPENDS_ON, source, target);
            const entry = strength.get(id);
            if (entry) {
                entry.count += 1;
            } else {
                strength.set(id, { from: source, to: target, count: 1 });
            }
        }

        for (const [id, { from, to, count }] of strength) {
            const existing = this.state.edges.get(id);
            if (existing) {
                existing.props.strength = count;
            } else {
                this.state.edges.set(id, { type: EdgeType.DEPENDS_ON, from, to, props: { strength: count } });
            }
        }
        log.debug('Dependencies recomputed', { dependencies: strength.size });
    }

    // ========================================================================
    // Reads
    // ========================================================================

    public async getFunctions(ids: readonly string[]): Promise<FunctionHit[]> {
        const hits: FunctionHit[] = [];
        for (const id of new Set(ids)) {
            const node = this.state.nodes.get(nodeId({ label: NodeLabel.Function, key: id }));
            if (!node || node.props.external === true) continue;
            const hit = toFunctionHit(node.props);
            if (hit) hits.push(hit);
        }
        return hits;
    }

    /**
     * Breadth-first over CALLS edges in both directions. Only defined
     * functions are expanded further; files and functions are reported.
     */
    public async callNeighbours(id: string, maxHops: number): Promise<GraphHit[]> {
        assertHopBound(maxHops);
        const seed = nodeId({ label: NodeLabel.Function, key: id });
        if (!this.state.nodes.has(seed)) return [];

        const adjacency = this.callAdjacency();
        const reached = new Map<string, { hops: number; viaLine: number | null }>([[seed, { hops: 0, viaLine: null }]]);
        let frontier = [seed];

        for (let hops = 1; hops <= maxHops && frontier.length > 0; hops++) {
            const next: string[] = [];
            for (const current of frontier) {
                for (const { neighbour, line } of adjacency.get(current) ?? []) {
                    if (reached.has(neighbour)) continue;
                    reached.set(neighbour, { hops, viaLine: line });
                    if (this.isDefinedFunction(neighbour)) next.push(neighbour);
                }
            }
            frontier = next;
        }

        const hits: GraphHit[] = [];
        for (const [reachedId, { hops, viaLine }] of reached) {
            if (reachedId === seed) continue;
            const node = this.state.nodes.get(reachedId);
            if (!node) continue;
            if (node.label === NodeLabel.Function && node.props.external === true) continue;
            const hit = toGraphHit([node.label], node.props, viaLine, hops);
            if (hit) hits.push(hit);
        }
        return hits;
    }

    public async siblingFunctions(id: string): Promise<FunctionHit[]> {
        const seed = nodeId({ label: NodeLabel.Function, key: id });
        const file = this.containingFile(seed);
        if (!file) return [];
        return this.functionsOf(file).filter((hit) => hit.id !== id);
    }

    public async sharedDependencyFunctions(id: string): Promise<FunctionHit[]> {
        const fileOf = this.containsIndex();
        const file = fileOf.get(nodeId({ label: NodeLabel.Function, key: id }));
        if (!file) return [];

        const modules = this.modulesRequiredBy(file);
        const others = new Set<string>();
        for (const edge of this.state.edges.values()) {
            if (edge.type !== EdgeType.REQUIRES || !modules.has(edge.to)) continue;
            const importer = this.isLabel(edge.from, NodeLabel.File) ? edge.from : fileOf.get(edge.from);
            if (importer && importer !== file) others.add(importer);
        }

        return [...others].flatMap((other) => this.functionsOf(other));
    }

    // ========================================================================
    // Maintenance
    // ========================================================================

    public async stats(): Promise<GraphStats> {
        const byLabel: Record<string, number> = {};
        for (const node of this.state.nodes.values()) {
            byLabel[node.label] = (byLabel[node.label] ?? 0) + 1;
        }
        const byType: Record<string, number> = {};
        for (const edge of this.state.edges.values()) {
            byType[edge.type] = (byType[edge.type] ?? 0) + 1;
        }
        return { nodes: this.state.nodes.size, edges: this.state.edges.size, byLabel, byType };
    }

    public async clear(): Promise<void> {
        this.state = { nodes: new Map(), edges: new Map() };
    }

    public async close(): Promise<void> {
        this.open = false;
    }

    /** Snapshot of a node's properties, for inspection. */
    public node(label: NodeLabel, key: string): Properties | undefined {
        const node = this.state.nodes.get(nodeId({ label, key }));
        return node ? { ...node.props } : undefined;
    }

    /** Snapshot of the edges of one type, endpoints given as node keys. */
    public edges(type: EdgeType): Array<{ from: string; to: string; props: Properties }> {
        const result: Array<{ from: string; to: string; props: Properties }> = [];
        for (const edge of this.state.edges.values()) {
            if (edge.type !== type) continue;
            const from = this.state.nodes.get(edge.from);
            const to = this.state.nodes.get(edge.to);
            if (from && to) result.push({ from: from.key, to: to.key, props: { ...edge.props } });
        }
        return result;
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private applyNode(state: GraphState, mutation: NodeMutation): void {
        const id = nodeId(mutation);
        const existing = state.nodes.get(id);
        if (!existing) {
            state.nodes.set(id, { label: mutation.label, key: mutation.key, props: { ...mutation.props } });
        } else if (!mutation.onCreateOnly) {
            existing.props = { ...existing.props, ...mutation.props };
        }
    }

    private applyEdge(state: GraphState, mutation: EdgeMutation, batchId: string): void {
        if (!isAllowedEdge(mutation.type, mutation.from.label, mutation.to.label)) {
            throw new BatchWriteError(
                batchId,
                `Edge ${mutation.from.label}-${mutation.type}->${mutation.to.label} is not in the schema`
            );
        }
        const from = nodeId(mutation.from);
        const to = nodeId(mutation.to);
        if (!state.nodes.has(from) || !state.nodes.has(to)) {
            throw new BatchWriteError(batchId, `Edge ${mutation.type} ${mutation.from.key} -> ${mutation.to.key} has a missing endpoint`);
        }

        const id = edgeId(mutation.type, from, to);
        const existing = state.edges.get(id);
        if (existing) {
            existing.props = { ...existing.props, ...mutation.props };
        } else {
            state.edges.set(id, { type: mutation.type, from, to, props: { ...mutation.props } });
        }
    }

    private isLabel(id: string, label: NodeLabel): boolean {
        return this.state.nodes.get(id)?.label === label;
    }

    private isDefinedFunction(id: string): boolean {
        const node = this.state.nodes.get(id);
        return node?.label === NodeLabel.Function && node.props.external !== true;
    }

    private containingFile(id: string): string | null {
        for (const edge of this.state.edges.values()) {
            if (edge.type === EdgeType.CONTAINS && edge.to === id) return edge.from;
        }
        return null;
    }

    /**
     * Function node id -> File node id, from every CONTAINS edge. Built once
     * per call that resolves many functions.
     */
    private containsIndex(): Map<string, string> {
        const index = new Map<string, string>();
        for (const edge of this.state.edges.values()) {
            if (edge.type === EdgeType.CONTAINS) index.set(edge.to, edge.from);
        }
        return index;
    }

    private functionsOf(file: string): FunctionHit[] {
        const hits: FunctionHit[] = [];
        for (const edge of this.state.edges.values()) {
            if (edge.type !== EdgeType.CONTAINS || edge.from !== file) continue;
            const node = this.state.nodes.get(edge.to);
            const hit = node ? toFunctionHit(node.props) : null;
            if (hit) hits.push(hit);
        }
        return hits;
    }

    /** Modules required by the file itself or by one of its functions. */
    private modulesRequiredBy(file: string): Set<string> {
        const owners = new Set<string>([file]);
        for (const edge of this.state.edges.values()) {
            if (edge.type === EdgeType.CONTAINS && edge.from === file) owners.add(edge.to);
        }
        const modules = new Set<string>();
        for (const edge of this.state.edges.values()) {
            if (edge.type === EdgeType.REQUIRES && owners.has(edge.from)) modules.add(edge.to);
        }
        return modules;
    }

    private callAdjacency(): Map<string, Array<{ neighbour: string; line: number | null }>> {
        const adjacency = new Map<string, Array<{ neighbour: string; line: number | null }>>();
        const add = (from: string, neighbour: string, line: number | null) => {
            const list = adjacency.get(from) ?? [];
            list.push({ neighbour, line });
            adjacency.set(from, list);
        };
        for (const edge of this.state.edges.values()) {
            if (edge.type !== EdgeType.CALLS) continue;
            const line = typeof edge.props.line === 'number' ? edge.props.line : null;
            add(edge.from, edge.to, line);
            add(edge.to, edge.from, line);
        }
        return adjacency;
    }
}
