import { MultiDirectedGraph } from 'graphology';
import type { Entry, GraphEdge, GraphStore, EdgeProperties, RelationshipKind } from '../types/index.js';
import { edgeKey } from '../types/index.js';

type NodeAttributes = Omit<Entry, 'id'>;

type EdgeAttributes = {
    kind: RelationshipKind;
    confidence: number;
    cluster_key: string;
    properties: EdgeProperties;
};

/**
 * In-process graph store backed by graphology.
 * Edges are keyed by (from_id, kind, to_id), so merging an existing key
 * overwrites its attributes instead of adding a parallel edge.
 * Used for dry runs and tests.
 */
export class MemoryGraphStore implements GraphStore {
    readonly name = 'memory';
    private readonly graph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>({ allowSelfLoops: false });

    async upsertEntries(entries: readonly Entry[]): Promise<void> {
        for (const { id, ...attributes } of entries) {
            this.graph.mergeNode(id, attributes);
        }
    }

    async upsertEdge(edge: GraphEdge): Promise<void> {
        for (const id of [edge.from_id, edge.to_id]) {
            if (!this.graph.hasNode(id)) {
                throw new Error(`Unknown entry: ${id}`);
            }
        }

        this.graph.mergeEdgeWithKey(edgeKey(edge), edge.from_id, edge.to_id, {
            kind: edge.kind,
            confidence: edge.confidence,
            cluster_key: edge.cluster_key,
            properties: { ...edge.properties },
        });
    }

    async listEdges(): Promise<GraphEdge[]> {
        const edges = this.graph.mapEdges((_key, attributes, source, target): GraphEdge => ({
            from_id: source,
            to_id: target,
            kind: attributes.kind,
            confidence: attributes.confidence,
            cluster_key: attributes.cluster_key,
            properties: { ...attributes.properties },
        }));

        return edges.sort(
            (a, b) => compare(a.from_id, b.from_id) || compare(a.kind, b.kind) || compare(a.to_id, b.to_id)
        );
    }

    async countEdges(): Promise<number> {
        return this.graph.size;
    }

    /**
     * Entry count (graph order).
     */
    countEntries(): number {
        return this.graph.order;
    }

    close(): void {
        this.graph.clear();
    }
}

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
