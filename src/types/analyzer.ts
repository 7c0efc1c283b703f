import type { Entry } from './entry.js';
import type { RelationshipCandidate, RelationshipKind } from './edge.js';

/**
 * Interface for pluggable relationship analyzers.
 *
 * An analyzer consumes the whole entry population and owns one relationship
 * kind and its confidence policy. New relationship kinds arrive as new
 * analyzers, never as new branches in the adjacency classifier.
 */
export interface RelationshipAnalyzer {
    /** Unique registry name */
    readonly name: string;

    /** Relationship kind this analyzer emits */
    readonly kind: RelationshipKind;

    /** One-line description for listings */
    readonly description: string;

    /**
     * Produce candidates for the given population.
     * Confidences are clamped and self-loops dropped by the registry.
     */
    analyze(entries: readonly Entry[], options: AnalyzerOptions): RelationshipCandidate[];
}

/**
 * Options passed to every analyzer run.
 */
export interface AnalyzerOptions {
    /** Smallest group the parameter-study analyzer links */
    minGroupSize: number;
}
