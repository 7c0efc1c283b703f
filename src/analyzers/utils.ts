import type { Entry, EdgeProperties, RelationshipCandidate, RelationshipKind } from '../types/index.js';
import { formulaOf } from '../types/index.js';
import { parseFormula, type Composition } from '../chem/formula.js';

/**
 * An entry together with its parsed formula.
 */
export interface ParsedEntry {
    entry: Entry;
    formula: string;
    composition: Composition;
}

/**
 * Entries whose formula parses, in input order. Unknown or unparseable
 * formulas are skipped.
 */
export function parsedEntries(entries: readonly Entry[]): ParsedEntry[] {
    const parsed: ParsedEntry[] = [];
    for (const entry of entries) {
        const formula = formulaOf(entry).trim();
        const composition = parseFormula(formula);
        if (composition) {
            parsed.push({ entry, formula, composition });
        }
    }
    return parsed;
}

/**
 * Group items by key, keeping groups in order of first appearance.
 */
export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string | null): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        if (key === null) continue;
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

/**
 * First item per key: the representative of each group.
 */
export function firstByKey<T, K>(items: Iterable<T>, keyOf: (item: T) => K): Map<K, T> {
    const firsts = new Map<K, T>();
    for (const item of items) {
        const key = keyOf(item);
        if (!firsts.has(key)) firsts.set(key, item);
    }
    return firsts;
}

/**
 * Consecutive pairs of a sequence: [a, b, c] → [a, b], [b, c].
 */
export function consecutivePairs<T>(items: readonly T[]): Array<[T, T]> {
    const pairs: Array<[T, T]> = [];
    for (let i = 0; i + 1 < items.length; i++) {
        const current = items[i];
        const next = items[i + 1];
        if (current !== undefined && next !== undefined) {
            pairs.push([current, next]);
        }
    }
    return pairs;
}

/**
 * Build an analyzer candidate between two entries.
 */
export function makeCandidate(
    from: Entry,
    to: Entry,
    kind: RelationshipKind,
    confidence: number,
    properties: EdgeProperties,
    clusterKey = ''
): RelationshipCandidate {
    return {
        from_id: from.id,
        to_id: to.id,
        kind,
        confidence,
        cluster_key: clusterKey,
        properties,
    };
}
