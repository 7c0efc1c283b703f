import type { Entry, RelationshipAnalyzer, RelationshipCandidate } from '../types/index.js';
import { RelationshipKind } from '../types/index.js';
import { familyOf } from '../chem/elements.js';
import { homonuclearElement, totalAtoms } from '../chem/formula.js';
import { consecutivePairs, firstByKey, groupBy, makeCandidate, parsedEntries } from './utils.js';

const GROUP_CONFIDENCE = 0.9;
const PERIOD_CONFIDENCE = 0.85;

interface Cluster {
    entry: Entry;
    element: string;
    size: number;
}

/**
 * Links homonuclear clusters of equal size whose elements share a periodic
 * family: Li3 → Na3 → K3 down group 1, Sc2 → Ti2 across the 3d row.
 * Within a family, members follow atomic number; the first entry of each
 * element represents it.
 */
export class PeriodicTrendAnalyzer implements RelationshipAnalyzer {
    readonly name = 'periodic-trend';
    readonly kind = RelationshipKind.PERIODIC_TREND;
    readonly description = 'Same-size homonuclear clusters along a periodic group or d-block period';

    analyze(entries: readonly Entry[]): RelationshipCandidate[] {
        const clusters: Cluster[] = [];
        for (const { entry, composition } of parsedEntries(entries)) {
            const element = homonuclearElement(composition);
            if (element !== null) {
                clusters.push({ entry, element, size: totalAtoms(composition) });
            }
        }

        const bySeries = groupBy(clusters, (cluster) => {
            const family = familyOf(cluster.element);
            return family ? `${family.name}:${cluster.size}` : null;
        });

        const candidates: RelationshipCandidate[] = [];
        for (const members of bySeries.values()) {
            const first = members[0];
            if (first === undefined) continue;
            const family = familyOf(first.element);
            if (!family) continue;

            const byElement = firstByKey(members, (member) => member.element);
            const ordered = family.elements.flatMap((element) => {
                const member = byElement.get(element);
                return member ? [member] : [];
            });

            const confidence = family.trend === 'group' ? GROUP_CONFIDENCE : PERIOD_CONFIDENCE;
            for (const [from, to] of consecutivePairs(ordered)) {
                candidates.push(
                    makeCandidate(from.entry, to.entry, this.kind, confidence, {
                        family: family.name,
                        trend: family.trend,
                        size: from.size,
                        from_element: from.element,
                        to_element: to.element,
                        reasoning: `${family.name} ${family.trend} series: ${from.element}${from.size} → ${to.element}${to.size}`,
                    })
                );
            }
        }

        return candidates;
    }
}
