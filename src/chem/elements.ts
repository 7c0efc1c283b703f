import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Periodic families used by the periodic-trend and cluster-size analyzers.
 * `group` families run down a column, `period` families across a d-block row.
 */
export interface ElementFamily {
    name: string;
    trend: 'group' | 'period';
    /** Members in increasing atomic number */
    elements: string[];
}

const ElementTableSchema = z.object({
    atomicNumbers: z.record(z.string(), z.number().int().positive()),
    families: z.array(
        z.object({
            name: z.string().min(1),
            trend: z.enum(['group', 'period']),
            elements: z.array(z.string().min(1)).min(1),
        })
    ),
});

const TABLE_URL = new URL('../../data/elements.json', import.meta.url);

const table = ElementTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, 'utf-8')));

const ATOMIC_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(table.atomicNumbers));

export const ELEMENT_FAMILIES: readonly ElementFamily[] = table.families;

const FAMILY_BY_ELEMENT: ReadonlyMap<string, ElementFamily> = new Map(
    ELEMENT_FAMILIES.flatMap((family) => family.elements.map((element) => [element, family] as const))
);

/**
 * Atomic number for an element symbol, or undefined for unknown symbols.
 */
export function atomicNumber(symbol: string): number | undefined {
    return ATOMIC_NUMBERS.get(symbol);
}

export function isElement(symbol: string): boolean {
    return ATOMIC_NUMBERS.has(symbol);
}

/**
 * Periodic family an element belongs to, if any.
 */
export function familyOf(symbol: string): ElementFamily | undefined {
    return FAMILY_BY_ELEMENT.get(symbol);
}
