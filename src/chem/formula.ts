import { atomicNumber, isElement } from './elements.js';

/**
 * Element counts of a parsed formula, in order of first appearance.
 */
export type Composition = ReadonlyMap<string, number>;

const TOKEN_PATTERN = /([A-Z][a-z]?)(\d*)/g;
const FORMULA_PATTERN = /^(?:[A-Z][a-z]?\d*)+$/;

/**
 * Parse a flat chemical formula ("Au4", "H2O", "C6H6") into element counts.
 * Repeated symbols accumulate. Returns null for empty input, unknown element
 * symbols, or notation the flat grammar does not cover (parentheses, charges).
 */
export function parseFormula(formula: string): Composition | null {
    const trimmed = formula.trim();
    if (!FORMULA_PATTERN.test(trimmed)) {
        return null;
    }

    const counts = new Map<string, number>();
    for (const match of trimmed.matchAll(TOKEN_PATTERN)) {
        const symbol = match[1];
        if (symbol === undefined || !isElement(symbol)) {
            return null;
        }
        const count = match[2] ? parseInt(match[2], 10) : 1;
        if (count === 0) {
            return null;
        }
        counts.set(symbol, (counts.get(symbol) ?? 0) + count);
    }

    return counts;
}

/**
 * Total number of atoms.
 */
export function totalAtoms(composition: Composition): number {
    let total = 0;
    for (const count of composition.values()) total += count;
    return total;
}

/**
 * Order-independent key of a composition: symbols sorted, each with its count
 * ("OH2" and "H2O" both give "H2O1").
 */
export function compositionKey(composition: Composition): string {
    return [...composition.keys()]
        .sort()
        .map((symbol) => `${symbol}${composition.get(symbol) ?? 0}`)
        .join('');
}

/**
 * Total electron count of the neutral species.
 */
export function electronCount(composition: Composition): number {
    let total = 0;
    for (const [symbol, count] of composition) {
        total += (atomicNumber(symbol) ?? 0) * count;
    }
    return total;
}

/**
 * The single element of a homonuclear cluster ("Li3" → "Li"), else null.
 */
export function homonuclearElement(composition: Composition): string | null {
    if (composition.size !== 1) return null;
    const [symbol] = composition.keys();
    return symbol ?? null;
}

/**
 * Element with the highest count; ties go to the first listed.
 */
export function primaryElement(composition: Composition): string | null {
    let best: string | null = null;
    let bestCount = 0;
    for (const [symbol, count] of composition) {
        if (count > bestCount) {
            best = symbol;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Whether a formula contains an element (by parsed symbol, so "Cl" does not contain "C").
 */
export function containsElement(formula: string, symbol: string): boolean {
    return parseFormula(formula)?.has(symbol) ?? false;
}
