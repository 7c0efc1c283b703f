import type { Entry } from './entry.js';
import type { GraphEdge } from './edge.js';

/**
 * Interface for graph store adapters (SQLite, in-memory, ...).
 * Stores enforce at most one edge per (from_id, to_id, kind).
 */
export interface GraphStore {
    /** Human-readable store name */
    readonly name: string;

    /**
     * Create or refresh entry nodes. Edges may only reference stored entries.
     */
    upsertEntries(entries: readonly Entry[]): Promise<void>;

    /**
     * Create the edge if absent, else overwrite its confidence, cluster_key
     * and properties. Never creates a parallel edge of the same kind.
     */
    upsertEdge(edge: GraphEdge): Promise<void>;

    /**
     * All edges, ordered by (from_id, kind, to_id).
     */
    listEdges(): Promise<GraphEdge[]>;

    countEdges(): Promise<number>;

    close(): void;
}
