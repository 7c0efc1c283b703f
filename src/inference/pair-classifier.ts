import type { Entry, RelationshipCandidate, ScoringWeights } from '../types/index.js';
import { RelationshipKind, clusterKeyOf } from '../types/index.js';
import { sortByStage, typeMentions } from './stage-classifier.js';
import { computeConfidence, hasFileHandoff, DEFAULT_WEIGHTS } from './scoring.js';

/**
 * A kind rule: the first rule whose predicate holds for (a, b) decides the kind.
 */
export interface KindRule {
    kind: RelationshipKind;
    matches: (a: Entry, b: Entry) => boolean;
}

/**
 * Kind rules in priority order. WORKFLOW_STEP always matches, so a pair
 * without lexical or file cues falls back to it instead of failing.
 */
export const KIND_RULES: readonly KindRule[] = [
    {
        kind: RelationshipKind.PROVIDES_STRUCTURE,
        matches: (a, b) => typeMentions(a.type, 'structural') && typeMentions(b.type, 'electronic'),
    },
    {
        kind: RelationshipKind.PROVIDES_ELECTRONIC_STRUCTURE,
        matches: (a, b) => typeMentions(a.type, 'electronic') && typeMentions(b.type, 'property'),
    },
    {
        kind: RelationshipKind.PROVIDES_INPUT_DATA,
        matches: hasFileHandoff,
    },
    {
        kind: RelationshipKind.SIMILAR_CALCULATION,
        matches: (a, b) => a.type === b.type,
    },
    {
        kind: RelationshipKind.WORKFLOW_STEP,
        matches: () => true,
    },
];

/**
 * Decide the relationship kind for an ordered pair (a precedes b).
 */
export function classifyKind(a: Entry, b: Entry): RelationshipKind {
    const rule = KIND_RULES.find((r) => r.matches(a, b));
    return rule?.kind ?? RelationshipKind.WORKFLOW_STEP;
}

/**
 * Classify an adjacent pair into a candidate.
 */
export function classifyPair(
    a: Entry,
    b: Entry,
    weights: ScoringWeights = DEFAULT_WEIGHTS
): RelationshipCandidate {
    return {
        from_id: a.id,
        to_id: b.id,
        kind: classifyKind(a, b),
        confidence: computeConfidence(a, b, weights),
        cluster_key: clusterKeyOf(a),
        properties: {},
    };
}

/**
 * Stage-sort one cluster and classify each adjacent pair.
 * A cluster of fewer than two entries yields nothing.
 *
 * @param entries - Entries sharing one non-empty cluster key
 * @param weights - Confidence weights
 */
export function classifyCluster(
    entries: readonly Entry[],
    weights: ScoringWeights = DEFAULT_WEIGHTS
): RelationshipCandidate[] {
    const sorted = sortByStage(entries);
    const candidates: RelationshipCandidate[] = [];

    for (let i = 0; i + 1 < sorted.length; i++) {
        const current = sorted[i];
        const next = sorted[i + 1];
        if (current === undefined || next === undefined) continue;
        candidates.push(classifyPair(current, next, weights));
    }

    return candidates;
}
