import type { Entry } from '../types/index.js';
import { UNCLUSTERED_KEY, clusterKeyOf, formulaOf } from '../types/index.js';
import { InvalidInputError, ErrorCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Immutable fields compared when the same id appears twice.
 */
function sameRecord(a: Entry, b: Entry): boolean {
    return (
        a.type === b.type &&
        formulaOf(a) === formulaOf(b) &&
        clusterKeyOf(a) === clusterKeyOf(b) &&
        a.has_input_files === b.has_input_files &&
        a.has_output_files === b.has_output_files
    );
}

/**
 * Validate an entry population before any processing.
 *
 * Throws InvalidInputError for blank ids, or for an id that appears twice
 * with differing fields. Exact repeats (same id, same fields) are collapsed
 * to their first occurrence.
 *
 * @returns The population with exact repeats removed, in input order
 */
export function validateEntries(entries: readonly Entry[]): Entry[] {
    const seen = new Map<string, Entry>();
    const unique: Entry[] = [];
    let repeats = 0;

    entries.forEach((entry, index) => {
        if (entry.id.trim() === '') {
            throw new InvalidInputError(`Entry at position ${index} has a blank id`, ErrorCode.MALFORMED_ENTRY_ID, {
                position: index,
            });
        }

        const previous = seen.get(entry.id);
        if (previous === undefined) {
            seen.set(entry.id, entry);
            unique.push(entry);
            return;
        }

        if (!sameRecord(previous, entry)) {
            throw new InvalidInputError(`Duplicate entry id with conflicting fields: ${entry.id}`, ErrorCode.DUPLICATE_ENTRY_ID, {
                id: entry.id,
                position: index,
            });
        }
        repeats++;
    });

    if (repeats > 0) {
        getLogger().warn({ repeats }, 'Collapsed repeated identical entries');
    }

    return unique;
}

/**
 * Partition entries by cluster key, preserving input order within each group.
 * Entries without a cluster key are grouped under UNCLUSTERED_KEY.
 */
export function groupByCluster(entries: readonly Entry[]): Map<string, Entry[]> {
    const groups = new Map<string, Entry[]>();

    for (const entry of entries) {
        const key = clusterKeyOf(entry);
        const group = groups.get(key);
        if (group) {
            group.push(entry);
        } else {
            groups.set(key, [entry]);
        }
    }

    return groups;
}

/**
 * Restrict a population to one cluster.
 */
export function filterByCluster(entries: readonly Entry[], clusterKey: string): Entry[] {
    return entries.filter((entry) => clusterKeyOf(entry) === clusterKey);
}

/**
 * Clusters eligible for adjacency inference (every group except the unclustered one).
 */
export function workflowClusters(groups: ReadonlyMap<string, Entry[]>): Array<[string, Entry[]]> {
    return [...groups].filter(([key]) => key !== UNCLUSTERED_KEY);
}
