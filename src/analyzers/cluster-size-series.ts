import type { Entry, RelationshipAnalyzer, RelationshipCandidate } from '../types/index.js';
import { RelationshipKind } from '../types/index.js';
import { familyOf } from '../chem/elements.js';
import { homonuclearElement, primaryElement, totalAtoms } from '../chem/formula.js';
import { consecutivePairs, firstByKey, groupBy, makeCandidate, parsedEntries } from './utils.js';

const SAME_ELEMENT_CONFIDENCE = 0.95;
const FAMILY_CONFIDENCE = 0.85;

interface Sized {
    entry: Entry;
    formula: string;
    size: number;
    element: string;
}

/**
 * Order one series by size and link consecutive sizes, smaller → larger.
 * The first entry of each size represents it.
 */
function sizeChain(members: readonly Sized[]): Array<[Sized, Sized]> {
    const bySize = firstByKey(members, (member) => member.size);
    const ordered = [...bySize.values()].sort((a, b) => a.size - b.size);
    return consecutivePairs(ordered);
}

/**
 * Links clusters of growing size.
 *
 * - same_element: homonuclear clusters of one element (C2 → C4 → C6)
 * - element_family: formulas whose primary element shares a periodic family,
 *   ordered by total atom count (Li2 → Na3)
 */
export class ClusterSizeSeriesAnalyzer implements RelationshipAnalyzer {
    readonly name = 'cluster-size-series';
    readonly kind = RelationshipKind.CLUSTER_SIZE_SERIES;
    readonly description = 'Growing cluster sizes of one element or one element family';

    analyze(entries: readonly Entry[]): RelationshipCandidate[] {
        const parsed = parsedEntries(entries);
        const candidates: RelationshipCandidate[] = [];

        // Same element
        const homonuclear: Sized[] = [];
        for (const { entry, formula, composition } of parsed) {
            const element = homonuclearElement(composition);
            if (element !== null) {
                homonuclear.push({ entry, formula, element, size: totalAtoms(composition) });
            }
        }

        for (const [element, members] of groupBy(homonuclear, (member) => member.element)) {
            for (const [smaller, larger] of sizeChain(members)) {
                candidates.push(
                    makeCandidate(smaller.entry, larger.entry, this.kind, SAME_ELEMENT_CONFIDENCE, {
                        series_type: 'same_element',
                        element,
                        smaller_size: smaller.size,
                        larger_size: larger.size,
                        smaller_formula: smaller.formula,
                        larger_formula: larger.formula,
                    })
                );
            }
        }

        // Element family
        const familyMembers: Sized[] = [];
        for (const { entry, formula, composition } of parsed) {
            const element = primaryElement(composition);
            if (element !== null) {
                familyMembers.push({ entry, formula, element, size: totalAtoms(composition) });
            }
        }

        const byFamily = groupBy(familyMembers, (member) => familyOf(member.element)?.name ?? null);
        for (const [family, members] of byFamily) {
            for (const [smaller, larger] of sizeChain(members)) {
                candidates.push(
                    makeCandidate(smaller.entry, larger.entry, this.kind, FAMILY_CONFIDENCE, {
                        series_type: 'element_family',
                        family,
                        smaller_size: smaller.size,
                        larger_size: larger.size,
                        smaller_formula: smaller.formula,
                        larger_formula: larger.formula,
                    })
                );
            }
        }

        return candidates;
    }
}
