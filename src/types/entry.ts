/**
 * Entry interface — one computational-chemistry calculation record.
 * Normalized from any entry source into this common shape.
 */
export interface Entry {
    /** Opaque, globally unique identifier */
    id: string;

    /** Free-text calculation kind (e.g., "geometry_optimization", "scf_calculation") */
    type: string;

    /** Chemical formula; empty and absent both mean unknown */
    formula?: string;

    /** Workflow origin (upload, dataset); absent excludes the entry from adjacency inference */
    cluster_key?: string;

    /** Whether the calculation ships input files */
    has_input_files: boolean;

    /** Whether the calculation ships output files */
    has_output_files: boolean;

    /** Human-readable entry name (optional, descriptive only) */
    name?: string;
}

/**
 * Raw entry data from a source before normalization.
 * Accepts the field names used by upstream metadata APIs as aliases.
 */
export interface RawEntryData {
    id?: string;
    entry_id?: string;
    type?: string;
    entry_type?: string;
    formula?: string | null;
    cluster_key?: string | null;
    upload_name?: string | null;
    name?: string | null;
    entry_name?: string | null;
    has_input_files?: boolean;
    has_output_files?: boolean;
}

/** Cluster key under which entries without a cluster are grouped */
export const UNCLUSTERED_KEY = '';

/** Formula with absent normalized to the empty string */
export function formulaOf(entry: Entry): string {
    return entry.formula ?? '';
}

/** Cluster key with absent normalized to the empty string */
export function clusterKeyOf(entry: Entry): string {
    return entry.cluster_key ?? UNCLUSTERED_KEY;
}
