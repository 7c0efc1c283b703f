import type { GraphEdge } from './edge.js';

/**
 * An edge the graph store rejected, with the store's reason.
 */
export interface FailedEdge {
    edge: GraphEdge;
    reason: string;
}

/**
 * Structured outcome of one inference run.
 */
export interface InferenceReport {
    /** Candidates produced by the classifier and all analyzers */
    candidatesConsidered: number;

    /** Candidates left after (from_id, to_id, kind) deduplication */
    candidatesDeduplicated: number;

    /** Deduplicated candidates dropped by the min-confidence threshold */
    candidatesBelowThreshold: number;

    edgesUpserted: number;
    edgesFailed: FailedEdge[];

    /** Upserted edges per relationship kind */
    edgesByKind: Record<string, number>;
}
