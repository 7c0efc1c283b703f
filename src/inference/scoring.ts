import type { Entry, ScoringWeights } from '../types/index.js';
import { formulaOf } from '../types/index.js';
import { areCompatibleStages } from './stage-classifier.js';

export const DEFAULT_WEIGHTS: ScoringWeights = {
    base: 0.5,
    formulaMatch: 0.3,
    fileHandoff: 0.2,
    compatibleStages: 0.2,
};

/**
 * Clamp a confidence into [0, 1]. Non-finite values become 0.
 */
export function clampConfidence(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1.0, Math.max(0.0, value));
}

/**
 * Whether the earlier entry hands files to the later one.
 */
export function hasFileHandoff(a: Entry, b: Entry): boolean {
    return a.has_output_files && b.has_input_files;
}

/**
 * Confidence for an adjacent pair (a precedes b).
 *
 * confidence = base + formulaMatch + fileHandoff + compatibleStages, clamped to [0, 1]
 *
 * A heuristic proxy for evidence strength. The weights are tunable and carry
 * no statistical calibration.
 */
export function computeConfidence(
    a: Entry,
    b: Entry,
    weights: ScoringWeights = DEFAULT_WEIGHTS
): number {
    let confidence = weights.base;

    const formula = formulaOf(a);
    if (formula !== '' && formula === formulaOf(b)) {
        confidence += weights.formulaMatch;
    }

    if (hasFileHandoff(a, b)) {
        confidence += weights.fileHandoff;
    }

    if (areCompatibleStages(a.type, b.type)) {
        confidence += weights.compatibleStages;
    }

    return clampConfidence(confidence);
}
