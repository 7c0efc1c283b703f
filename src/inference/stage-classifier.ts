import type { Entry } from '../types/index.js';

/**
 * Workflow stage inferred from lexical cues in an entry's type.
 */
export type Stage = 'structural' | 'electronic' | 'property' | 'post-processing';

/**
 * A keyword rule mapping type substrings to a stage band.
 */
export interface StageRule {
    stage: Stage;
    band: number;
    keywords: readonly string[];
}

/**
 * Stage bands in workflow order (lower = earlier). Evaluated first-match-wins,
 * so a type matching several rules lands in the earliest band.
 * New keywords are a data change here, not a code change.
 */
export const STAGE_RULES: readonly StageRule[] = [
    { stage: 'structural', band: 10, keywords: ['geometry', 'optimization'] },
    { stage: 'electronic', band: 20, keywords: ['scf', 'dft'] },
    { stage: 'property', band: 30, keywords: ['dos', 'band'] },
    { stage: 'post-processing', band: 40, keywords: ['analysis', 'post'] },
];

/** Band for types without any lexical match */
export const DEFAULT_BAND = 100;

/** Priority shift applied by the file-presence tie-break */
export const FILE_ADJUSTMENT = 5;

/**
 * Whether a calculation type mentions any keyword of a stage.
 */
export function typeMentions(type: string, stage: Stage): boolean {
    const lower = type.toLowerCase();
    const rule = STAGE_RULES.find((r) => r.stage === stage);
    return rule !== undefined && rule.keywords.some((keyword) => lower.includes(keyword));
}

/**
 * The first stage rule a calculation type matches, if any.
 */
export function matchStageRule(type: string): StageRule | undefined {
    const lower = type.toLowerCase();
    return STAGE_RULES.find((rule) => rule.keywords.some((keyword) => lower.includes(keyword)));
}

/**
 * Lexical band of a calculation type, ignoring file flags.
 */
export function stageBand(type: string): number {
    return matchStageRule(type)?.band ?? DEFAULT_BAND;
}

/**
 * Execution-stage priority of an entry (lower = earlier in the workflow).
 *
 * Input files without outputs suggest an early step (−5); outputs without
 * inputs suggest a final step (+5).
 */
export function stagePriority(entry: Entry): number {
    let priority = stageBand(entry.type);

    if (entry.has_input_files && !entry.has_output_files) {
        priority -= FILE_ADJUSTMENT;
    } else if (entry.has_output_files && !entry.has_input_files) {
        priority += FILE_ADJUSTMENT;
    }

    return priority;
}

/**
 * Sort entries by stage priority. Stable: equal priorities keep input order.
 * Returns a new array.
 */
export function sortByStage(entries: readonly Entry[]): Entry[] {
    return entries
        .map((entry, index) => ({ entry, index, priority: stagePriority(entry) }))
        .sort((a, b) => a.priority - b.priority || a.index - b.index)
        .map(({ entry }) => entry);
}

/**
 * Whether two types sit in equal or neighbouring lexical bands.
 * Types without a lexical match are never compatible.
 */
export function areCompatibleStages(typeA: string, typeB: string): boolean {
    const ruleA = matchStageRule(typeA);
    const ruleB = matchStageRule(typeB);
    if (!ruleA || !ruleB) return false;

    const distance = Math.abs(STAGE_RULES.indexOf(ruleA) - STAGE_RULES.indexOf(ruleB));
    return distance <= 1;
}
