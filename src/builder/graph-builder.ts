import type {
    AnalyzerSettings,
    CalcGraphConfig,
    Entry,
    EntrySource,
    GraphStore,
    InferenceReport,
    RelationshipCandidate,
    ScoringWeights,
} from '../types/index.js';
import { DEFAULT_CONFIG, UNCLUSTERED_KEY } from '../types/index.js';
import { validateEntries, groupByCluster, filterByCluster, workflowClusters } from '../inference/clustering.js';
import { classifyCluster } from '../inference/pair-classifier.js';
import { AnalyzerRegistry, createDefaultRegistry } from '../analyzers/index.js';
import { buildEdges } from './edge-builder.js';
import { SqliteGraphStore } from '../storage/database.js';
import { MemoryGraphStore } from '../storage/memory-store.js';
import { JsonFileEntrySource } from '../sources/json-file.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const CALCGRAPH_VERSION = '1.0.0';

/**
 * Options for one inference run.
 */
export interface InferenceOptions {
    scoring: ScoringWeights;
    minConfidence: number;
    batchSize: number;
    clusterFilter?: string;
    elementFilter?: string;
    analyzers: AnalyzerSettings;
    /** Analyzer registry; defaults to every built-in analyzer */
    registry?: AnalyzerRegistry;
}

export const DEFAULT_INFERENCE_OPTIONS: InferenceOptions = {
    scoring: DEFAULT_CONFIG.scoring,
    minConfidence: DEFAULT_CONFIG.minConfidence,
    batchSize: DEFAULT_CONFIG.batchSize,
    analyzers: DEFAULT_CONFIG.analyzers,
};

/**
 * Candidates inferred from a population, with the population they cover.
 */
export interface InferenceResult {
    population: Entry[];
    adjacency: RelationshipCandidate[];
    analyzed: RelationshipCandidate[];
}

/**
 * Pure inference: entries in, candidates out. No store is touched.
 *
 * 1. Validate the population (InvalidInputError on blank or conflicting ids)
 * 2. Apply the cluster filter
 * 3. Group by cluster, stage-sort each cluster, classify adjacent pairs
 * 4. Run the selected analyzers over the whole population
 */
export function inferCandidates(
    entries: readonly Entry[],
    options: InferenceOptions = DEFAULT_INFERENCE_OPTIONS
): InferenceResult {
    const validated = validateEntries(entries);
    const population = options.clusterFilter !== undefined
        ? filterByCluster(validated, options.clusterFilter)
        : validated;

    const groups = groupByCluster(population);
    const clusters = workflowClusters(groups);

    // Clusters share no state; each reads only its own entries.
    const adjacency = clusters.flatMap(([, members]) => classifyCluster(members, options.scoring));

    getLogger().info(
        { entries: population.length, clusters: clusters.length, unclustered: groups.get(UNCLUSTERED_KEY)?.length ?? 0, adjacency: adjacency.length },
        'Adjacency candidates classified'
    );

    let analyzed: RelationshipCandidate[] = [];
    if (options.analyzers.enabled) {
        const registry = options.registry ?? createDefaultRegistry();
        analyzed = registry.run(population, {
            include: options.analyzers.include,
            minGroupSize: options.analyzers.minGroupSize,
            elementFilter: options.elementFilter,
        });
        getLogger().info({ analyzed: analyzed.length }, 'Analyzer candidates produced');
    }

    return { population, adjacency, analyzed };
}

/**
 * Full inference run against a graph store.
 *
 * Input validation happens before the store is touched; store failures are
 * collected per edge in the returned report.
 */
export async function runInference(
    entries: readonly Entry[],
    store: GraphStore,
    options: InferenceOptions = DEFAULT_INFERENCE_OPTIONS
): Promise<InferenceReport> {
    const { population, adjacency, analyzed } = inferCandidates(entries, options);

    await store.upsertEntries(population);

    return buildEdges(store, [...adjacency, ...analyzed], {
        minConfidence: options.minConfidence,
        batchSize: options.batchSize,
    });
}

/**
 * Map a resolved configuration onto inference options.
 */
export function inferenceOptionsFrom(config: CalcGraphConfig, registry?: AnalyzerRegistry): InferenceOptions {
    return {
        scoring: config.scoring,
        minConfidence: config.minConfidence,
        batchSize: config.batchSize,
        clusterFilter: config.clusterFilter,
        elementFilter: config.elementFilter,
        analyzers: config.analyzers,
        registry,
    };
}

/**
 * Main graph builder — orchestrates one CLI run:
 *
 * 1. Load entries from the configured source
 * 2. Open the graph store (SQLite, or in-memory for dry runs)
 * 3. Infer and upsert edges
 * 4. Record run metadata
 */
export async function buildGraph(
    config: CalcGraphConfig,
    source?: EntrySource
): Promise<InferenceReport> {
    const entrySource = source ?? sourceFromConfig(config);
    const entries = await entrySource.loadEntries();

    getLogger().info(
        { source: entrySource.name, entries: entries.length, out: config.dryRun ? '(dry run)' : config.out },
        'Starting inference'
    );

    const startTime = Date.now();
    const store = config.dryRun ? new MemoryGraphStore() : new SqliteGraphStore(config.out);

    try {
        const report = await runInference(entries, store, inferenceOptionsFrom(config));

        if (store instanceof SqliteGraphStore) {
            store.insertRun({
                created_at: new Date().toISOString(),
                calcgraph_version: CALCGRAPH_VERSION,
                config_json: JSON.stringify(config),
                entry_count: entries.length,
                report_json: JSON.stringify(report),
            });
        }

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        getLogger().info(
            {
                upserted: report.edgesUpserted,
                failed: report.edgesFailed.length,
                totalEdges: await store.countEdges(),
                elapsed: `${elapsed}s`,
            },
            'Inference complete'
        );

        return report;
    } finally {
        store.close();
    }
}

function sourceFromConfig(config: CalcGraphConfig): EntrySource {
    if (!config.input) {
        throw new ConfigurationError('No entry source configured: pass --input or set "input" in calcgraph.config.json');
    }
    return new JsonFileEntrySource(config.input);
}
