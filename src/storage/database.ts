import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import type { Entry, GraphEdge, GraphStore, RunRecord, EdgeProperties } from '../types/index.js';
import { isRelationshipKind } from '../types/index.js';
import { StoreError, ErrorCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: inference session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  calcgraph_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  entry_count INTEGER NOT NULL,
  report_json TEXT NOT NULL DEFAULT '{}'
);

-- Entries: calculation nodes
CREATE TABLE IF NOT EXISTS entries (
  entry_id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  formula TEXT NOT NULL DEFAULT '',
  cluster_key TEXT NOT NULL DEFAULT '',
  name TEXT,
  has_input_files INTEGER NOT NULL DEFAULT 0,
  has_output_files INTEGER NOT NULL DEFAULT 0
);

-- Edges: inferred relationships, one per (from_id, to_id, kind)
CREATE TABLE IF NOT EXISTS edges (
  edge_id INTEGER PRIMARY KEY,
  from_id TEXT NOT NULL REFERENCES entries(entry_id),
  to_id TEXT NOT NULL REFERENCES entries(entry_id),
  kind TEXT NOT NULL,
  confidence REAL NOT NULL,
  cluster_key TEXT NOT NULL DEFAULT '',
  properties_json TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  CHECK (from_id <> to_id),
  CHECK (confidence >= 0.0 AND confidence <= 1.0)
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_edges_triple ON edges(from_id, to_id, kind);
CREATE INDEX IF NOT EXISTS idx_edges_to ON edges(to_id);
CREATE INDEX IF NOT EXISTS idx_edges_kind ON edges(kind);
CREATE INDEX IF NOT EXISTS idx_entries_cluster ON entries(cluster_key);
CREATE INDEX IF NOT EXISTS idx_entries_formula ON entries(formula);
`;

interface EntryRow {
    entry_id: string;
    type: string;
    formula: string;
    cluster_key: string;
    name: string | null;
    has_input_files: number;
    has_output_files: number;
}

interface EdgeRow {
    from_id: string;
    to_id: string;
    kind: string;
    confidence: number;
    cluster_key: string;
    properties_json: string;
}

/**
 * calcgraph database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and the GraphStore contract.
 */
export class SqliteGraphStore implements GraphStore {
    readonly name = 'sqlite';
    private db: Database.Database;

    /**
     * Opens or creates the database at `dbPath`. With `mustExist`, a missing
     * file is a `StoreError` and nothing is created.
     */
    constructor(dbPath: string, options: { mustExist?: boolean } = {}) {
        if (options.mustExist && !existsSync(dbPath)) {
            throw new StoreError(`Database not found: ${dbPath}`, ErrorCode.DATABASE_NOT_FOUND, { dbPath });
        }
        this.db = new Database(dbPath, { fileMustExist: options.mustExist ?? false });

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Entries ──────────────────────────────────────────────

    /**
     * Insert or refresh entries in a single transaction.
     */
    async upsertEntries(entries: readonly Entry[]): Promise<void> {
        const stmt = this.db.prepare(`
      INSERT INTO entries (entry_id, type, formula, cluster_key, name, has_input_files, has_output_files)
      VALUES (@entry_id, @type, @formula, @cluster_key, @name, @has_input_files, @has_output_files)
      ON CONFLICT(entry_id) DO UPDATE SET
        type = excluded.type,
        formula = excluded.formula,
        cluster_key = excluded.cluster_key,
        name = COALESCE(excluded.name, name),
        has_input_files = excluded.has_input_files,
        has_output_files = excluded.has_output_files
    `);

        const upsertAll = this.db.transaction((batch: readonly Entry[]) => {
            for (const entry of batch) {
                stmt.run({
                    entry_id: entry.id,
                    type: entry.type,
                    formula: entry.formula ?? '',
                    cluster_key: entry.cluster_key ?? '',
                    name: entry.name ?? null,
                    has_input_files: entry.has_input_files ? 1 : 0,
                    has_output_files: entry.has_output_files ? 1 : 0,
                });
            }
        });

        upsertAll(entries);
    }

    getEntry(id: string): Entry | undefined {
        const row = this.db.prepare('SELECT * FROM entries WHERE entry_id = ?').get(id) as EntryRow | undefined;
        return row ? rowToEntry(row) : undefined;
    }

    getAllEntries(): Entry[] {
        const rows = this.db.prepare('SELECT * FROM entries ORDER BY entry_id').all() as EntryRow[];
        return rows.map(rowToEntry);
    }

    getEntryCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM entries').get() as { count: number };
        return row.count;
    }

    // ─── Edges ────────────────────────────────────────────────

    /**
     * Create the edge or overwrite its properties; the unique triple index
     * keeps at most one edge per (from_id, to_id, kind).
     */
    async upsertEdge(edge: GraphEdge): Promise<void> {
        this.db
            .prepare(`
      INSERT INTO edges (from_id, to_id, kind, confidence, cluster_key, properties_json)
      VALUES (@from_id, @to_id, @kind, @confidence, @cluster_key, @properties_json)
      ON CONFLICT(from_id, to_id, kind) DO UPDATE SET
        confidence = excluded.confidence,
        cluster_key = excluded.cluster_key,
        properties_json = excluded.properties_json
    `)
            .run({
                from_id: edge.from_id,
                to_id: edge.to_id,
                kind: edge.kind,
                confidence: edge.confidence,
                cluster_key: edge.cluster_key,
                properties_json: JSON.stringify(edge.properties),
            });
    }

    async listEdges(): Promise<GraphEdge[]> {
        return this.getAllEdges();
    }

    async countEdges(): Promise<number> {
        return this.getEdgeCount();
    }

    getAllEdges(): GraphEdge[] {
        const rows = this.db
            .prepare('SELECT from_id, to_id, kind, confidence, cluster_key, properties_json FROM edges ORDER BY from_id, kind, to_id')
            .all() as EdgeRow[];
        return rows.flatMap((row) => {
            const edge = rowToEdge(row);
            return edge ? [edge] : [];
        });
    }

    getEdgesByKind(kind: string): GraphEdge[] {
        return this.getAllEdges().filter((edge) => edge.kind === kind);
    }

    getEdgeCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM edges').get() as { count: number };
        return row.count;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, calcgraph_version, config_json, entry_count, report_json)
      VALUES (@created_at, @calcgraph_version, @config_json, @entry_count, @report_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        entries: number;
        clusters: number;
        edges: number;
        runs: number;
        edgesByKind: Record<string, number>;
    } {
        const entries = this.getEntryCount();
        const edges = this.getEdgeCount();
        const clusters = (
            this.db.prepare("SELECT COUNT(DISTINCT cluster_key) as count FROM entries WHERE cluster_key <> ''").get() as {
                count: number;
            }
        ).count;
        const runs = (this.db.prepare('SELECT COUNT(*) as count FROM runs').get() as { count: number }).count;

        const kindRows = this.db.prepare('SELECT kind, COUNT(*) as count FROM edges GROUP BY kind ORDER BY kind').all() as Array<{
            kind: string;
            count: number;
        }>;
        const edgesByKind: Record<string, number> = {};
        for (const row of kindRows) {
            edgesByKind[row.kind] = row.count;
        }

        return { entries, clusters, edges, runs, edgesByKind };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

// ─── Row mapping ──────────────────────────────────────────

function rowToEntry(row: EntryRow): Entry {
    const entry: Entry = {
        id: row.entry_id,
        type: row.type,
        has_input_files: row.has_input_files === 1,
        has_output_files: row.has_output_files === 1,
    };
    if (row.formula !== '') entry.formula = row.formula;
    if (row.cluster_key !== '') entry.cluster_key = row.cluster_key;
    if (row.name !== null) entry.name = row.name;
    return entry;
}

function rowToEdge(row: EdgeRow): GraphEdge | null {
    if (!isRelationshipKind(row.kind)) {
        getLogger().warn({ kind: row.kind }, 'Skipping edge with unknown kind');
        return null;
    }
    return {
        from_id: row.from_id,
        to_id: row.to_id,
        kind: row.kind,
        confidence: row.confidence,
        cluster_key: row.cluster_key,
        properties: parseProperties(row.properties_json),
    };
}

function parseProperties(json: string): EdgeProperties {
    const parsed: unknown = JSON.parse(json);
    const properties: EdgeProperties = {};
    if (typeof parsed === 'object' && parsed !== null) {
        for (const [key, value] of Object.entries(parsed)) {
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                properties[key] = value;
            }
        }
    }
    return properties;
}
