/**
 * Graph schema: node labels, their key properties, the allowed
 * relationships, and every Cypher statement derived from them.
 *
 * Statements are generated once at module load from the tables below;
 * callers pick a template by name and pass values only as parameters.
 */

export const NodeLabel = {
    File: 'File',
    Function: 'Function',
    Module: 'Module',
    Variable: 'Variable',
    Parameter: 'Parameter',
} as const;

export type NodeLabel = (typeof NodeLabel)[keyof typeof NodeLabel];

export const EdgeType = {
    CONTAINS: 'CONTAINS',
    REQUIRES: 'REQUIRES',
    CALLS: 'CALLS',
    DEFINES_VAR: 'DEFINES_VAR',
    HAS_PARAMETER: 'HAS_PARAMETER',
    DEPENDS_ON: 'DEPENDS_ON',
} as const;

export type EdgeType = (typeof EdgeType)[keyof typeof EdgeType];

/** Property holding each label's identity key. */
export const NODE_KEYS: Readonly<Record<NodeLabel, string>> = {
    File: 'path',
    Function: 'id',
    Module: 'name',
    Variable: 'id',
    Parameter: 'id',
};

export interface EdgeShape {
    type: EdgeType;
    from: NodeLabel;
    to: NodeLabel;
}

export const EDGE_SCHEMA: readonly EdgeShape[] = [
    { type: EdgeType.CONTAINS, from: NodeLabel.File, to: NodeLabel.Function },
    { type: EdgeType.REQUIRES, from: NodeLabel.File, to: NodeLabel.Module },
    { type: EdgeType.REQUIRES, from: NodeLabel.Function, to: NodeLabel.Module },
    { type: EdgeType.CALLS, from: NodeLabel.Function, to: NodeLabel.Function },
    { type: EdgeType.CALLS, from: NodeLabel.File, to: NodeLabel.Function },
    { type: EdgeType.DEFINES_VAR, from: NodeLabel.File, to: NodeLabel.Variable },
    { type: EdgeType.DEFINES_VAR, from: NodeLabel.Function, to: NodeLabel.Variable },
    { type: EdgeType.HAS_PARAMETER, from: NodeLabel.Function, to: NodeLabel.Parameter },
    { type: EdgeType.DEPENDS_ON, from: NodeLabel.File, to: NodeLabel.File },
];

export function edgeShapeKey(type: EdgeType, from: NodeLabel, to: NodeLabel): string {
    return `${from}-${type}->${to}`;
}

export function isAllowedEdge(type: EdgeType, from: NodeLabel, to: NodeLabel): boolean {
    return EDGE_SCHEMA.some((shape) => shape.type === type && shape.from === from && shape.to === to);
}

// ============================================================================
// Write templates
// ============================================================================

const LABELS: readonly NodeLabel[] = Object.values(NodeLabel);

function buildNodeTemplates(onCreateOnly: boolean): Readonly<Record<NodeLabel, string>> {
    const set = onCreateOnly ? 'ON CREATE SET n += row.props' : 'SET n += row.props';
    const template = (label: NodeLabel) =>
        `UNWIND $rows AS row MERGE (n:${label} {${NODE_KEYS[label]}: row.key}) ${set}`;
    return {
        File: template(NodeLabel.File),
        Function: template(NodeLabel.Function),
        Module: template(NodeLabel.Module),
        Variable: template(NodeLabel.Variable),
        Parameter: template(NodeLabel.Parameter),
    };
}

/** MERGE by key, then overwrite the given properties. */
export const UPSERT_NODE = buildNodeTemplates(false);

/** MERGE by key; properties only land on a node this statement creates. */
export const ENSURE_NODE = buildNodeTemplates(true);

/** Keyed by edgeShapeKey(). Both endpoints must already exist. */
export const UPSERT_EDGE: ReadonlyMap<string, string> = new Map(
    EDGE_SCHEMA.map((shape) => [
        edgeShapeKey(shape.type, shape.from, shape.to),
        [
            'UNWIND $rows AS row',
            `MATCH (a:${shape.from} {${NODE_KEYS[shape.from]}: row.from})`,
            `MATCH (b:${shape.to} {${NODE_KEYS[shape.to]}: row.to})`,
            `MERGE (a)-[r:${shape.type}]->(b)`,
            'SET r += row.props',
        ].join(' '),
    ])
);

export const CONSTRAINTS: readonly string[] = LABELS.map(
    (label) =>
        `CREATE CONSTRAINT ${label.toLowerCase()}_${NODE_KEYS[label]}_unique IF NOT EXISTS ` +
        `FOR (n:${label}) REQUIRE n.${NODE_KEYS[label]} IS UNIQUE`
);

// ============================================================================
// Aggregation
// ============================================================================

export const RESET_DEPENDENCY_STRENGTH = `MATCH (:File)-[d:DEPENDS_ON]->(:File) SET d.strength = 0`;

/**
 * DEPENDS_ON strength = number of CALLS edges whose caller's file (the
 * caller itself when it is a File) differs from the callee's file.
 */
export const AGGREGATE_DEPENDENCIES = `
MATCH (caller)-[:CALLS]->(callee:Function)<-[:CONTAINS]-(target:File)
OPTIONAL MATCH (owner:File)-[:CONTAINS]->(caller)
WITH coalesce(owner, CASE WHEN caller:File THEN caller ELSE null END) AS source, target
WHERE source IS NOT NULL AND source <> target
WITH source, target, count(*) AS strength
MERGE (source)-[d:DEPENDS_ON]->(target)
SET d.strength = strength
`;

// ============================================================================
// Read queries
// ============================================================================

export const GET_FUNCTIONS = `
MATCH (n:Function)
WHERE n.id IN $ids AND coalesce(n.external, false) = false
RETURN n, labels(n) AS labels, null AS viaLine
`;

/** Largest hop bound accepted for call-graph traversal. */
export const MAX_TRAVERSAL_HOPS = 10;

export function assertHopBound(maxHops: number): void {
    if (!Number.isInteger(maxHops) || maxHops < 1 || maxHops > MAX_TRAVERSAL_HOPS) {
        throw new RangeError(`maxHops must be an integer between 1 and ${MAX_TRAVERSAL_HOPS}`);
    }
}

const callNeighbourhoodCache = new Map<number, string>();

/**
 * Undirected CALLS reachability within `maxHops`. Intermediate nodes must be
 * defined functions; endpoints may be functions or calling files. The hop
 * bound is part of the pattern, so one statement is built per bound.
 */
export function callNeighbourhoodQuery(maxHops: number): string {
    assertHopBound(maxHops);
    let query = callNeighbourhoodCache.get(maxHops);
    if (!query) {
        query = `
MATCH (seed:Function {id: $id})
MATCH p = (seed)-[:CALLS*1..${maxHops}]-(n)
WHERE n <> seed
  AND (n:File OR coalesce(n.external, false) = false)
  AND all(x IN nodes(p)[1..-1] WHERE x:Function AND coalesce(x.external, false) = false)
WITH n, p ORDER BY length(p)
WITH n, min(length(p)) AS hops, collect(last(relationships(p)).line) AS lines
RETURN n, labels(n) AS labels, head(lines) AS viaLine, hops
`;
        callNeighbourhoodCache.set(maxHops, query);
    }
    return query;
}

/** Same relation through APOC path expansion; needs the APOC plugin. */
export const CALL_NEIGHBOURHOOD_APOC = `
MATCH (seed:Function {id: $id})
CALL apoc.path.subgraphNodes(seed, {relationshipFilter: 'CALLS', labelFilter: '+Function|+File', maxLevel: $maxHops})
YIELD node
WITH seed, node AS n
WHERE n <> seed AND (n:File OR coalesce(n.external, false) = false)
RETURN n, labels(n) AS labels, null AS viaLine, null AS hops
`;

export const SIBLING_FUNCTIONS = `
MATCH (f:File)-[:CONTAINS]->(seed:Function {id: $id})
MATCH (f)-[:CONTAINS]->(n:Function)
WHERE n <> seed
RETURN n, labels(n) AS labels, null AS viaLine
`;

/**
 * Functions of other files importing a module the seed's file imports,
 * at file level or from inside one of its functions.
 */
export const SHARED_DEPENDENCY_FUNCTIONS = `
MATCH (f:File)-[:CONTAINS]->(:Function {id: $id})
MATCH (f)-[:CONTAINS*0..1]->()-[:REQUIRES]->(m:Module)<-[:REQUIRES]-()<-[:CONTAINS*0..1]-(other:File)
WHERE other <> f
MATCH (other)-[:CONTAINS]->(n:Function)
RETURN DISTINCT n, labels(n) AS labels, null AS viaLine
`;

export const COUNT_NODES = `MATCH (n) UNWIND labels(n) AS label RETURN label, count(*) AS count`;

export const COUNT_EDGES = `MATCH ()-[r]->() RETURN type(r) AS type, count(*) AS count`;

export const CLEAR_GRAPH = `MATCH (n) DETACH DELETE n`;
