import type { Entry, RelationshipCandidate } from '../../types/index.js';
import { RelationshipKind } from '../../types/index.js';

/**
 * Entry with no files, no formula and no cluster unless overridden.
 */
export function makeEntry(id: string, overrides: Partial<Omit<Entry, 'id'>> = {}): Entry {
    return {
        id,
        type: 'single_point',
        has_input_files: false,
        has_output_files: false,
        ...overrides,
    };
}

export function makeCandidate(
    from_id: string,
    to_id: string,
    confidence: number,
    kind: RelationshipKind = RelationshipKind.WORKFLOW_STEP,
    properties: RelationshipCandidate['properties'] = {}
): RelationshipCandidate {
    return { from_id, to_id, kind, confidence, cluster_key: '', properties };
}

/** Geometry optimization handing a structure to an SCF run, both on Au4 in cluster C */
export function scenarioA(): Entry[] {
    return [
        makeEntry('g1', {
            type: 'geometry_optimization',
            formula: 'Au4',
            cluster_key: 'C',
            has_input_files: false,
            has_output_files: true,
        }),
        makeEntry('s1', {
            type: 'scf_calculation',
            formula: 'Au4',
            cluster_key: 'C',
            has_input_files: true,
            has_output_files: true,
        }),
    ];
}
