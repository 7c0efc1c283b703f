import type { Entry, RelationshipAnalyzer, RelationshipCandidate } from '../types/index.js';
import { RelationshipKind, UNCLUSTERED_KEY, clusterKeyOf, formulaOf } from '../types/index.js';
import { firstByKey, groupBy, makeCandidate } from './utils.js';

const CONFIDENCE = 0.8;

/**
 * Links the same formula across workflow clusters: for every pair of
 * clusters sharing a formula, the first entry of the earlier cluster points
 * at the first entry of the later one.
 */
export class SameMaterialAnalyzer implements RelationshipAnalyzer {
    readonly name = 'same-material';
    readonly kind = RelationshipKind.SAME_MATERIAL;
    readonly description = 'One formula studied in different clusters';

    analyze(entries: readonly Entry[]): RelationshipCandidate[] {
        const byFormula = groupBy(entries, (entry) => {
            const formula = formulaOf(entry);
            return formula === '' || clusterKeyOf(entry) === UNCLUSTERED_KEY ? null : formula;
        });

        const candidates: RelationshipCandidate[] = [];
        for (const [formula, members] of byFormula) {
            const representatives = [...firstByKey(members, clusterKeyOf).values()];

            for (let i = 0; i < representatives.length; i++) {
                for (let j = i + 1; j < representatives.length; j++) {
                    const from = representatives[i];
                    const to = representatives[j];
                    if (from === undefined || to === undefined) continue;
                    candidates.push(
                        makeCandidate(from, to, this.kind, CONFIDENCE, {
                            formula,
                            from_cluster: clusterKeyOf(from),
                            to_cluster: clusterKeyOf(to),
                        })
                    );
                }
            }
        }

        return candidates;
    }
}
