import type { AnalyzerOptions, Entry, RelationshipAnalyzer, RelationshipCandidate } from '../types/index.js';
import { RelationshipKind, UNCLUSTERED_KEY, clusterKeyOf, formulaOf } from '../types/index.js';
import { consecutivePairs, groupBy, makeCandidate } from './utils.js';

const CONFIDENCE = 0.9;

/**
 * Links repeated calculations of one system: entries sharing cluster key,
 * formula and type are treated as a parameter sweep and chained in id order.
 * Unclustered entries are unrelated calculations and never form a study.
 */
export class ParameterStudyAnalyzer implements RelationshipAnalyzer {
    readonly name = 'parameter-study';
    readonly kind = RelationshipKind.PARAMETER_STUDY;
    readonly description = 'Same system and calculation type repeated within one cluster';

    analyze(entries: readonly Entry[], options: AnalyzerOptions): RelationshipCandidate[] {
        const studies = groupBy(entries, (entry) => {
            const formula = formulaOf(entry);
            const clusterKey = clusterKeyOf(entry);
            if (formula === '' || clusterKey === UNCLUSTERED_KEY) return null;
            return [clusterKey, formula, entry.type].join('\u0000');
        });

        const candidates: RelationshipCandidate[] = [];
        for (const members of studies.values()) {
            if (members.length < options.minGroupSize) continue;

            const ordered = [...members].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
            consecutivePairs(ordered).forEach(([from, to], index) => {
                candidates.push(
                    makeCandidate(
                        from,
                        to,
                        this.kind,
                        CONFIDENCE,
                        {
                            formula: formulaOf(from),
                            calculation_type: from.type,
                            step: index + 1,
                            study_size: members.length,
                        },
                        clusterKeyOf(from)
                    )
                );
            });
        }

        return candidates;
    }
}
