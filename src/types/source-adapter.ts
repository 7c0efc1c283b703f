import type { Entry, RawEntryData } from './entry.js';

/**
 * Interface for entry sources (JSON files, metadata API exports, ...).
 * Pagination and retries are resolved by the source; the engine receives
 * a materialized sequence.
 */
export interface EntrySource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Load every entry for one inference run, in source order.
     */
    loadEntries(): Promise<Entry[]>;

    /**
     * Normalize raw source data into an Entry.
     */
    normalize(raw: RawEntryData): Entry;
}
