/**
 * Relationship kinds supported by calcgraph.
 *
 * Adjacency (stage-ordered neighbours within one cluster):
 *   PROVIDES_STRUCTURE, PROVIDES_ELECTRONIC_STRUCTURE, PROVIDES_INPUT_DATA,
 *   SIMILAR_CALCULATION, WORKFLOW_STEP
 *
 * Analyzer (whole-population heuristics):
 *   PERIODIC_TREND, CLUSTER_SIZE_SERIES, PARAMETER_STUDY, ISOELECTRONIC, SAME_MATERIAL
 */
export enum RelationshipKind {
    // Adjacency kinds
    PROVIDES_STRUCTURE = 'PROVIDES_STRUCTURE',
    PROVIDES_ELECTRONIC_STRUCTURE = 'PROVIDES_ELECTRONIC_STRUCTURE',
    PROVIDES_INPUT_DATA = 'PROVIDES_INPUT_DATA',
    SIMILAR_CALCULATION = 'SIMILAR_CALCULATION',
    WORKFLOW_STEP = 'WORKFLOW_STEP',

    // Analyzer kinds
    PERIODIC_TREND = 'PERIODIC_TREND',
    CLUSTER_SIZE_SERIES = 'CLUSTER_SIZE_SERIES',
    PARAMETER_STUDY = 'PARAMETER_STUDY',
    ISOELECTRONIC = 'ISOELECTRONIC',
    SAME_MATERIAL = 'SAME_MATERIAL',
}

/** Scalar edge property value (graph stores only keep scalars) */
export type EdgePropertyValue = string | number | boolean;

/** Analyzer-specific provenance carried on an edge */
export type EdgeProperties = Record<string, EdgePropertyValue>;

/**
 * Candidate relationship produced during one inference run.
 */
export interface RelationshipCandidate {
    /** Source entry id */
    from_id: string;

    /** Destination entry id (never equal to from_id) */
    to_id: string;

    kind: RelationshipKind;

    /** Heuristic evidence strength in [0, 1]; not a calibrated probability */
    confidence: number;

    /** Cluster the candidate was inferred in; empty for cross-cluster analyzers */
    cluster_key: string;

    /** Provenance (element, series type, reasoning, ...) */
    properties: EdgeProperties;
}

/**
 * Durable edge record written to a graph store.
 * Unique by (from_id, to_id, kind).
 */
export type GraphEdge = RelationshipCandidate;

/** Set of adjacency kinds */
export const ADJACENCY_KINDS: ReadonlySet<RelationshipKind> = new Set([
    RelationshipKind.PROVIDES_STRUCTURE,
    RelationshipKind.PROVIDES_ELECTRONIC_STRUCTURE,
    RelationshipKind.PROVIDES_INPUT_DATA,
    RelationshipKind.SIMILAR_CALCULATION,
    RelationshipKind.WORKFLOW_STEP,
]);

/** Set of analyzer kinds */
export const ANALYZER_KINDS: ReadonlySet<RelationshipKind> = new Set([
    RelationshipKind.PERIODIC_TREND,
    RelationshipKind.CLUSTER_SIZE_SERIES,
    RelationshipKind.PARAMETER_STUDY,
    RelationshipKind.ISOELECTRONIC,
    RelationshipKind.SAME_MATERIAL,
]);

/**
 * Identity key of an edge: one edge per (from_id, to_id, kind).
 */
export function edgeKey(edge: Pick<RelationshipCandidate, 'from_id' | 'to_id' | 'kind'>): string {
    return `${edge.from_id}\u0000${edge.kind}\u0000${edge.to_id}`;
}

/**
 * Check whether a string is a known relationship kind.
 */
export function isRelationshipKind(value: string): value is RelationshipKind {
    const kinds: readonly string[] = Object.values(RelationshipKind);
    return kinds.includes(value);
}
