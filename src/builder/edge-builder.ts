import type { FailedEdge, GraphEdge, GraphStore, InferenceReport, RelationshipCandidate } from '../types/index.js';
import { edgeKey } from '../types/index.js';
import { UpsertError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Options for the edge builder.
 */
export interface EdgeBuilderOptions {
    /** Drop candidates below this confidence before upserting */
    minConfidence: number;
    /** Maximum upserts issued per batch */
    batchSize: number;
}

export const DEFAULT_EDGE_BUILDER_OPTIONS: EdgeBuilderOptions = {
    minConfidence: 0.0,
    batchSize: 500,
};

/**
 * Collapse candidates sharing (from_id, to_id, kind).
 * The highest confidence wins; on a tie the earliest produced candidate stays.
 * Output keeps the order in which each key was first produced.
 */
export function dedupeCandidates(candidates: readonly RelationshipCandidate[]): RelationshipCandidate[] {
    const best = new Map<string, RelationshipCandidate>();

    for (const candidate of candidates) {
        const key = edgeKey(candidate);
        const current = best.get(key);
        if (current === undefined || candidate.confidence > current.confidence) {
            best.set(key, candidate);
        }
    }

    return [...best.values()];
}

/**
 * Split candidates at the confidence threshold.
 */
export function applyThreshold(
    candidates: readonly RelationshipCandidate[],
    minConfidence: number
): { kept: GraphEdge[]; dropped: number } {
    const kept = candidates.filter((candidate) => candidate.confidence >= minConfidence);
    return { kept, dropped: candidates.length - kept.length };
}

/**
 * Upsert edges in bounded batches.
 *
 * Keys are unique after deduplication, so the upserts of one batch run
 * concurrently. A failed upsert is recorded as an UpsertError and never
 * aborts the batch; nothing is retried.
 */
export async function upsertEdges(
    store: GraphStore,
    edges: readonly GraphEdge[],
    batchSize: number = DEFAULT_EDGE_BUILDER_OPTIONS.batchSize
): Promise<{ upserted: GraphEdge[]; failed: FailedEdge[] }> {
    const upserted: GraphEdge[] = [];
    const failed: FailedEdge[] = [];
    const size = Math.max(1, Math.floor(batchSize));

    for (let start = 0; start < edges.length; start += size) {
        const batch = edges.slice(start, start + size);
        const results = await Promise.allSettled(batch.map((edge) => store.upsertEdge(edge)));

        results.forEach((result, index) => {
            const edge = batch[index];
            if (edge === undefined) return;

            if (result.status === 'fulfilled') {
                upserted.push(edge);
                return;
            }

            const error = new UpsertError(
                `Failed to upsert ${edge.kind} ${edge.from_id} → ${edge.to_id}: ${errorMessage(result.reason)}`,
                { from_id: edge.from_id, to_id: edge.to_id, kind: edge.kind, store: store.name },
                { cause: result.reason }
            );
            getLogger().warn({ err: error }, 'Edge upsert failed');
            failed.push({ edge, reason: errorMessage(result.reason) });
        });

        getLogger().debug({ batchStart: start, batchSize: batch.length, failed: failed.length }, 'Upsert batch finished');
    }

    return { upserted, failed };
}

/**
 * Deduplicate, threshold and upsert a run's candidates, and report the outcome.
 */
export async function buildEdges(
    store: GraphStore,
    candidates: readonly RelationshipCandidate[],
    options: EdgeBuilderOptions = DEFAULT_EDGE_BUILDER_OPTIONS
): Promise<InferenceReport> {
    const deduplicated = dedupeCandidates(candidates);
    const { kept, dropped } = applyThreshold(deduplicated, options.minConfidence);

    getLogger().info(
        { candidates: candidates.length, deduplicated: deduplicated.length, belowThreshold: dropped, store: store.name },
        'Upserting edges'
    );

    const { upserted, failed } = await upsertEdges(store, kept, options.batchSize);

    const edgesByKind: Record<string, number> = {};
    for (const edge of upserted) {
        edgesByKind[edge.kind] = (edgesByKind[edge.kind] ?? 0) + 1;
    }

    return {
        candidatesConsidered: candidates.length,
        candidatesDeduplicated: deduplicated.length,
        candidatesBelowThreshold: dropped,
        edgesUpserted: upserted.length,
        edgesFailed: failed,
        edgesByKind,
    };
}
