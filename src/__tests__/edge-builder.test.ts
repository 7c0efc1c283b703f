import { describe, it, expect, beforeEach } from 'vitest';
import { dedupeCandidates, applyThreshold, upsertEdges, buildEdges } from '../builder/edge-builder.js';
import { MemoryGraphStore } from '../storage/memory-store.js';
import { RelationshipKind, type Entry, type GraphEdge, type GraphStore } from '../types/index.js';
import { makeCandidate, makeEntry } from './helpers/entries.js';

/**
 * Store that rejects edges pointing at a chosen entry and records the rest.
 */
class FlakyStore implements GraphStore {
    readonly name = 'flaky';
    readonly written: GraphEdge[] = [];

    constructor(private readonly rejectTo: string) {}

    async upsertEntries(_entries: readonly Entry[]): Promise<void> {}

    async upsertEdge(edge: GraphEdge): Promise<void> {
        if (edge.to_id === this.rejectTo) {
            throw new Error('constraint violation');
        }
        this.written.push(edge);
    }

    async listEdges(): Promise<GraphEdge[]> {
        return [...this.written];
    }

    async countEdges(): Promise<number> {
        return this.written.length;
    }

    close(): void {}
}

describe('dedupeCandidates', () => {
    it('should keep the highest confidence per edge key', () => {
        const result = dedupeCandidates([
            makeCandidate('a', 'b', 0.5),
            makeCandidate('a', 'b', 0.7),
            makeCandidate('b', 'c', 0.6),
        ]);
        expect(result.map((c) => [c.from_id, c.to_id, c.confidence])).toEqual([
            ['a', 'b', 0.7],
            ['b', 'c', 0.6],
        ]);
    });

    it('should keep the earliest candidate on a tie', () => {
        const first = makeCandidate('a', 'b', 0.8, RelationshipKind.WORKFLOW_STEP, { source: 'first' });
        const second = makeCandidate('a', 'b', 0.8, RelationshipKind.WORKFLOW_STEP, { source: 'second' });
        expect(dedupeCandidates([first, second])).toEqual([first]);
    });

    it('should treat different kinds and directions as different edges', () => {
        const result = dedupeCandidates([
            makeCandidate('a', 'b', 0.5, RelationshipKind.WORKFLOW_STEP),
            makeCandidate('a', 'b', 0.5, RelationshipKind.SIMILAR_CALCULATION),
            makeCandidate('b', 'a', 0.5, RelationshipKind.WORKFLOW_STEP),
        ]);
        expect(result).toHaveLength(3);
    });
});

describe('applyThreshold', () => {
    it('should keep candidates at or above the threshold', () => {
        const { kept, dropped } = applyThreshold(
            [makeCandidate('a', 'b', 0.2), makeCandidate('b', 'c', 0.5), makeCandidate('c', 'd', 0.8)],
            0.5
        );
        expect(kept.map((c) => c.confidence)).toEqual([0.5, 0.8]);
        expect(dropped).toBe(1);
    });
});

describe('upsertEdges', () => {
    it('should record failures per edge without aborting the batch', async () => {
        const store = new FlakyStore('bad');
        const edges = [makeCandidate('a', 'b', 0.5), makeCandidate('a', 'bad', 0.5), makeCandidate('b', 'c', 0.5)];

        const { upserted, failed } = await upsertEdges(store, edges, 2);

        expect(upserted.map((e) => e.to_id)).toEqual(['b', 'c']);
        expect(failed).toEqual([{ edge: edges[1], reason: 'constraint violation' }]);
        expect(store.written.map((e) => e.to_id)).toEqual(['b', 'c']);
    });

    it('should accept batch sizes below one', async () => {
        const store = new FlakyStore('none');
        const { upserted } = await upsertEdges(store, [makeCandidate('a', 'b', 0.5), makeCandidate('b', 'c', 0.5)], 0);
        expect(upserted).toHaveLength(2);
    });
});

describe('buildEdges', () => {
    let store: MemoryGraphStore;

    beforeEach(async () => {
        store = new MemoryGraphStore();
        await store.upsertEntries(['a', 'b', 'c'].map((id) => makeEntry(id)));
    });

    it('should report deduplication, threshold and upserts', async () => {
        const report = await buildEdges(
            store,
            [
                makeCandidate('a', 'b', 0.4),
                makeCandidate('a', 'b', 0.9),
                makeCandidate('b', 'c', 0.3, RelationshipKind.SIMILAR_CALCULATION),
                makeCandidate('a', 'c', 0.6, RelationshipKind.SAME_MATERIAL),
            ],
            { minConfidence: 0.5, batchSize: 10 }
        );

        expect(report).toEqual({
            candidatesConsidered: 4,
            candidatesDeduplicated: 3,
            candidatesBelowThreshold: 1,
            edgesUpserted: 2,
            edgesFailed: [],
            edgesByKind: {
                [RelationshipKind.WORKFLOW_STEP]: 1,
                [RelationshipKind.SAME_MATERIAL]: 1,
            },
        });
        expect(await store.countEdges()).toBe(2);
    });

    it('should overwrite instead of duplicating on a rerun', async () => {
        const candidates = [makeCandidate('a', 'b', 0.7, RelationshipKind.WORKFLOW_STEP, { run: 1 })];
        await buildEdges(store, candidates);
        await buildEdges(store, [makeCandidate('a', 'b', 0.8, RelationshipKind.WORKFLOW_STEP, { run: 2 })]);

        const edges = await store.listEdges();
        expect(edges).toHaveLength(1);
        expect(edges[0]?.confidence).toBe(0.8);
        expect(edges[0]?.properties).toEqual({ run: 2 });
    });

    it('should collect edges to unknown entries as failures', async () => {
        const report = await buildEdges(store, [makeCandidate('a', 'ghost', 0.9)]);
        expect(report.edgesUpserted).toBe(0);
        expect(report.edgesFailed).toHaveLength(1);
        expect(report.edgesFailed[0]?.reason).toBe('Unknown entry: ghost');
    });
});
