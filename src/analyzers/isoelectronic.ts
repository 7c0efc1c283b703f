import type { Entry, RelationshipAnalyzer, RelationshipCandidate } from '../types/index.js';
import { RelationshipKind } from '../types/index.js';
import { compositionKey, electronCount } from '../chem/formula.js';
import { consecutivePairs, firstByKey, groupBy, makeCandidate, parsedEntries } from './utils.js';

const CONFIDENCE = 0.7;

/**
 * Links distinct species with the same total electron count (N2, CO, Si).
 * Species are compared by composition, so H2O and OH2 are one species. They
 * are ordered by composition key; the first entry of each represents it.
 */
export class IsoelectronicAnalyzer implements RelationshipAnalyzer {
    readonly name = 'isoelectronic';
    readonly kind = RelationshipKind.ISOELECTRONIC;
    readonly description = 'Different formulas with equal electron counts';

    analyze(entries: readonly Entry[]): RelationshipCandidate[] {
        const parsed = parsedEntries(entries);
        const byElectrons = groupBy(parsed, (item) => String(electronCount(item.composition)));

        const candidates: RelationshipCandidate[] = [];
        for (const [electrons, members] of byElectrons) {
            const bySpecies = firstByKey(members, (member) => compositionKey(member.composition));
            const ordered = [...bySpecies.entries()]
                .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
                .map(([, member]) => member);

            for (const [from, to] of consecutivePairs(ordered)) {
                candidates.push(
                    makeCandidate(from.entry, to.entry, this.kind, CONFIDENCE, {
                        electrons: Number(electrons),
                        from_formula: from.formula,
                        to_formula: to.formula,
                    })
                );
            }
        }

        return candidates;
    }
}
