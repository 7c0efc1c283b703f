import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Entry, EntrySource, RawEntryData } from '../types/index.js';
import { SourceError, ErrorCode, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * One raw record. Upstream metadata APIs name the fields entry_id,
 * entry_type, upload_name and entry_name; both spellings are accepted.
 */
const RawEntrySchema = z
    .object({
        id: z.string().optional(),
        entry_id: z.string().optional(),
        type: z.string().optional(),
        entry_type: z.string().optional(),
        formula: z.string().nullable().optional(),
        cluster_key: z.string().nullable().optional(),
        upload_name: z.string().nullable().optional(),
        name: z.string().nullable().optional(),
        entry_name: z.string().nullable().optional(),
        has_input_files: z.boolean().optional(),
        has_output_files: z.boolean().optional(),
    })
    .passthrough()
    .refine((raw) => raw.id !== undefined || raw.entry_id !== undefined, {
        message: 'record has neither "id" nor "entry_id"',
    });

/**
 * A bare array of records, or a page envelope `{ data: [...] }`.
 */
const EntryFileSchema = z.union([
    z.array(RawEntrySchema),
    z.object({ data: z.array(RawEntrySchema) }).passthrough().transform((page) => page.data),
]);

/**
 * Entry source reading a materialized JSON export from disk.
 */
export class JsonFileEntrySource implements EntrySource {
    readonly name = 'json-file';

    constructor(private readonly path: string) {}

    async loadEntries(): Promise<Entry[]> {
        let text: string;
        try {
            text = await readFile(this.path, 'utf-8');
        } catch (error) {
            throw new SourceError(`Cannot read entry file ${this.path}: ${errorMessage(error)}`, ErrorCode.SOURCE_READ_FAILED, {
                path: this.path,
            });
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw new SourceError(`Entry file ${this.path} is not valid JSON: ${errorMessage(error)}`, ErrorCode.SOURCE_INVALID_RECORD, {
                path: this.path,
            });
        }

        const parsed = EntryFileSchema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue ? issue.path.join('.') : '';
            throw new SourceError(
                `Invalid entry file ${this.path}${where ? ` at ${where}` : ''}: ${issue?.message ?? 'unknown error'}`,
                ErrorCode.SOURCE_INVALID_RECORD,
                { path: this.path }
            );
        }

        const entries = parsed.data.map((raw) => this.normalize(raw));
        getLogger().debug({ path: this.path, entries: entries.length }, 'Entries loaded');
        return entries;
    }

    /**
     * Normalize a raw record: resolve aliases, trim strings, and drop empty
     * optional fields.
     */
    normalize(raw: RawEntryData): Entry {
        const entry: Entry = {
            id: (raw.id ?? raw.entry_id ?? '').trim(),
            type: (raw.type ?? raw.entry_type ?? 'unknown').trim(),
            has_input_files: raw.has_input_files ?? false,
            has_output_files: raw.has_output_files ?? false,
        };

        const formula = (raw.formula ?? '').trim();
        if (formula !== '') entry.formula = formula;

        const clusterKey = (raw.cluster_key ?? raw.upload_name ?? '').trim();
        if (clusterKey !== '') entry.cluster_key = clusterKey;

        const name = (raw.name ?? raw.entry_name ?? '').trim();
        if (name !== '') entry.name = name;

        return entry;
    }
}
