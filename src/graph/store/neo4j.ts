/**
 * Neo4j GraphStore
 *
 * Writes file batches with UNWIND statements from schema.ts and answers the
 * retrieval relations in Cypher. One batch is one write transaction.
 */

import neo4j, { Driver, Integer, isInt, isNode, Neo4jError, Record as Neo4jRecord } from 'neo4j-driver';
import { BatchWriteError, ConnectivityError, InitializationError, QueryCapabilityError } from '../../common/errors';
import { createLogger, errorMessage } from '../../common/logger';
import {
    assertHopBound,
    AGGREGATE_DEPENDENCIES,
    CALL_NEIGHBOURHOOD_APOC,
    callNeighbourhoodQuery,
    CLEAR_GRAPH,
    CONSTRAINTS,
    COUNT_EDGES,
    COUNT_NODES,
    edgeShapeKey,
    ENSURE_NODE,
    GET_FUNCTIONS,
    RESET_DEPENDENCY_STRENGTH,
    SHARED_DEPENDENCY_FUNCTIONS,
    SIBLING_FUNCTIONS,
    UPSERT_EDGE,
    UPSERT_NODE,
} from '../schema';
import {
    FunctionHit,
    GraphBatch,
    GraphHit,
    GraphMutation,
    GraphStats,
    GraphStore,
    Properties,
    PropertyValue,
} from '../types';
import { toGraphHit } from './hits';

const log = createLogger('graph:neo4j');

const PROCEDURE_NOT_FOUND = 'Neo.ClientError.Procedure.ProcedureNotFound';

export type TraversalMode = 'cypher' | 'apoc';

export interface Neo4jStoreOptions {
    uri: string;
    user: string;
    password?: string;
    database: string;
    connectTimeoutMs: number;
    queryTimeoutMs: number;
    /** 'apoc' expands call neighbourhoods with apoc.path (plugin required) */
    traversal?: TraversalMode;
}

// ============================================================================
// Parameter encoding
// ============================================================================

type EncodedValue = string | number | boolean | string[] | Integer;

/**
 * Integers are sent as Neo4j integers; plain JS numbers would be stored as floats.
 */
export function encodeProperties(values: Properties): Record<string, EncodedValue> {
    const encoded: Record<string, EncodedValue> = {};
    for (const [key, value] of Object.entries(values)) {
        encoded[key] = typeof value === 'number' && Number.isInteger(value) ? neo4j.int(value) : value;
    }
    return encoded;
}

function decodeValue(value: unknown): PropertyValue | undefined {
    if (isInt(value)) return value.toNumber();
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) return value;
    return undefined;
}

export function decodeProperties(values: Record<string, unknown>): Properties {
    const decoded: Properties = {};
    for (const [key, value] of Object.entries(values)) {
        const plain = decodeValue(value);
        if (plain !== undefined) decoded[key] = plain;
    }
    return decoded;
}

function decodeNumber(value: unknown): number | null {
    const plain = decodeValue(value);
    return typeof plain === 'number' ? plain : null;
}

export interface Statement {
    query: string;
    rows: Array<Record<string, unknown>>;
}

/**
 * Groups consecutive mutations that share a template into one UNWIND
 * statement. Order across groups is kept, so endpoints are written before
 * the edges that reference them.
 */
export function groupMutations(batch: GraphBatch): Statement[] {
    const statements: Statement[] = [];
    let current: Statement | undefined;

    for (const mutation of batch.mutations) {
        const query = templateFor(mutation, batch.id);
        const row = mutation.kind === 'node'
            ? { key: mutation.key, props: encodeProperties(mutation.props) }
            : { from: mutation.from.key, to: mutation.to.key, props: encodeProperties(mutation.props) };

        if (current && current.query === query) {
            current.rows.push(row);
        } else {
            current = { query, rows: [row] };
            statements.push(current);
        }
    }
    return statements;
}

function templateFor(mutation: GraphMutation, batchId: string): string {
    if (mutation.kind === 'node') {
        return mutation.onCreateOnly ? ENSURE_NODE[mutation.label] : UPSERT_NODE[mutation.label];
    }
    const query = UPSERT_EDGE.get(edgeShapeKey(mutation.type, mutation.from.label, mutation.to.label));
    if (!query) {
        throw new BatchWriteError(
            batchId,
            `Edge ${mutation.from.label}-${mutation.type}->${mutation.to.label} is not in the schema`
        );
    }
    return query;
}

// ============================================================================
// Store
// ============================================================================

export class Neo4jGraphStore implements GraphStore {
    private driver: Driver | null = null;
    private readonly traversal: TraversalMode;

    constructor(private readonly options: Neo4jStoreOptions) {
        this.traversal = options.traversal ?? 'cypher';
    }

    public isReady(): boolean {
        return this.driver !== null;
    }

    /**
     * Verify connectivity and create the uniqueness constraints. On failure
     * the driver is closed and the store stays not ready.
     *
     * @throws InitializationError when no password is configured
     * @throws ConnectivityError when the server cannot be reached in time
     */
    public async connect(): Promise<void> {
        if (this.driver) return;
        if (!this.options.password) {
            throw new InitializationError('NEO4J_PASSWORD is not set');
        }

        const driver = neo4j.driver(this.options.uri, neo4j.auth.basic(this.options.user, this.options.password), {
            connectionTimeout: this.options.connectTimeoutMs,
            connectionAcquisitionTimeout: this.options.connectTimeoutMs,
        });

        try {
            await driver.verifyConnectivity({ database: this.options.database });
            const session = driver.session({ database: this.options.database });
            try {
                for (const constraint of CONSTRAINTS) {
                    await session.run(constraint);
                }
            } finally {
                await session.close();
            }
        } catch (error) {
            await driver.close();
            throw new ConnectivityError(`Cannot connect to Neo4j at ${this.options.uri}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        this.driver = driver;
        log.info('Connected', { uri: this.options.uri, database: this.options.database });
    }

    public async applyBatch(batch: GraphBatch): Promise<void> {
        const driver = this.requireDriver();
        const statements = groupMutations(batch);
        const session = driver.session({ database: this.options.database, defaultAccessMode: neo4j.session.WRITE });
        try {
            await session.executeWrite(async (tx) => {
                for (const statement of statements) {
                    await tx.run(statement.query, { rows: statement.rows });
                }
            });
        } catch (error) {
            throw new BatchWriteError(batch.id, `Batch ${batch.id} failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    public async recomputeDependencies(): Promise<void> {
        const driver = this.requireDriver();
        const session = driver.session({ database: this.options.database, defaultAccessMode: neo4j.session.WRITE });
        try {
            await session.executeWrite(async (tx) => {
                await tx.run(RESET_DEPENDENCY_STRENGTH);
                await tx.run(AGGREGATE_DEPENDENCIES);
            });
        } finally {
            await session.close();
        }
    }

    // ========================================================================
    // Reads
    // ========================================================================

    public async getFunctions(ids: readonly string[]): Promise<FunctionHit[]> {
        if (ids.length === 0) return [];
        const records = await this.read(GET_FUNCTIONS, { ids: [...ids] });
        return records.flatMap((record) => {
            const hit = this.toHit(record);
            return hit?.kind === 'function' ? [hit] : [];
        });
    }

    public async callNeighbours(id: string, maxHops: number): Promise<GraphHit[]> {
        assertHopBound(maxHops);
        const records = this.traversal === 'apoc'
            ? await this.readApoc(id, maxHops)
            : await this.read(callNeighbourhoodQuery(maxHops), { id });
        return records.flatMap((record) => {
            const hit = this.toHit(record);
            return hit ? [hit] : [];
        });
    }

    public async siblingFunctions(id: string): Promise<FunctionHit[]> {
        return this.readFunctions(SIBLING_FUNCTIONS, id);
    }

    public async sharedDependencyFunctions(id: string): Promise<FunctionHit[]> {
        return this.readFunctions(SHARED_DEPENDENCY_FUNCTIONS, id);
    }

    // ========================================================================
    // Maintenance
    // ========================================================================

    public async stats(): Promise<GraphStats> {
        const byLabel = this.countsOf(await this.read(COUNT_NODES, {}), 'label');
        const byType = this.countsOf(await this.read(COUNT_EDGES, {}), 'type');
        const sum = (counts: Record<string, number>) => Object.values(counts).reduce((a, b) => a + b, 0);
        return { nodes: sum(byLabel), edges: sum(byType), byLabel, byType };
    }

    public async clear(): Promise<void> {
        const driver = this.requireDriver();
        const session = driver.session({ database: this.options.database, defaultAccessMode: neo4j.session.WRITE });
        try {
            await session.executeWrite(async (tx) => {
                await tx.run(CLEAR_GRAPH);
            });
            log.info('Graph cleared');
        } finally {
            await session.close();
        }
    }

    public async close(): Promise<void> {
        if (!this.driver) return;
        const driver = this.driver;
        this.driver = null;
        await driver.close();
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private requireDriver(): Driver {
        if (!this.driver) {
            throw new ConnectivityError('Neo4j store is not connected');
        }
        return this.driver;
    }

    private async read(query: string, params: Record<string, unknown>): Promise<Neo4jRecord[]> {
        const driver = this.requireDriver();
        const session = driver.session({ database: this.options.database, defaultAccessMode: neo4j.session.READ });
        try {
            return await session.executeRead(
                async (tx) => (await tx.run(query, params)).records,
                { timeout: this.options.queryTimeoutMs }
            );
        } finally {
            await session.close();
        }
    }

    private async readApoc(id: string, maxHops: number): Promise<Neo4jRecord[]> {
        try {
            return await this.read(CALL_NEIGHBOURHOOD_APOC, { id, maxHops: neo4j.int(maxHops) });
        } catch (error) {
            if (error instanceof Neo4jError && error.code === PROCEDURE_NOT_FOUND) {
                throw new QueryCapabilityError('APOC path expansion is not available on this server', { cause: error });
            }
            throw error;
        }
    }

    private async readFunctions(query: string, id: string): Promise<FunctionHit[]> {
        const records = await this.read(query, { id });
        return records.flatMap((record) => {
            const hit = this.toHit(record);
            return hit?.kind === 'function' ? [hit] : [];
        });
    }

    private toHit(record: Neo4jRecord): GraphHit | null {
        const node: unknown = record.get('n');
        if (typeof node !== 'object' || node === null || !isNode(node)) return null;
        const hops = record.has('hops') ? decodeNumber(record.get('hops')) : null;
        return toGraphHit(node.labels, decodeProperties(node.properties), decodeNumber(record.get('viaLine')), hops ?? undefined);
    }

    private countsOf(records: Neo4jRecord[], keyField: string): Record<string, number> {
        const counts: Record<string, number> = {};
        for (const record of records) {
            const key: unknown = record.get(keyField);
            const count = decodeNumber(record.get('count'));
            if (typeof key === 'string' && count !== null) counts[key] = count;
        }
        return counts;
    }
}
