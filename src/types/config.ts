/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Names of the built-in analyzers.
 */
export type AnalyzerName =
    | 'periodic-trend'
    | 'cluster-size-series'
    | 'isoelectronic'
    | 'parameter-study'
    | 'same-material';

/**
 * Additive confidence weights for adjacency candidates.
 * Tunable heuristics with no calibration behind them.
 */
export interface ScoringWeights {
    base: number;
    formulaMatch: number;
    fileHandoff: number;
    compatibleStages: number;
}

/**
 * Analyzer configuration.
 */
export interface AnalyzerSettings {
    enabled: boolean;
    /** Analyzers to run; empty means every registered analyzer */
    include: AnalyzerName[];
    /** Smallest group the parameter-study analyzer links */
    minGroupSize: number;
}

/**
 * Full calcgraph configuration merged from CLI flags, env vars, and config file.
 */
export interface CalcGraphConfig {
    // Input
    input?: string;

    // Output
    out: string;
    dryRun: boolean;

    // Filters
    minConfidence: number;
    clusterFilter?: string;
    elementFilter?: string;

    // Upsert batching
    batchSize: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Scoring
    scoring: ScoringWeights;

    // Analyzers
    analyzers: AnalyzerSettings;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<CalcGraphConfig, 'out'> = {
    dryRun: false,
    minConfidence: 0.0,
    batchSize: 500,
    logLevel: 'info',
    jsonLogs: false,
    scoring: {
        base: 0.5,
        formulaMatch: 0.3,
        fileHandoff: 0.2,
        compatibleStages: 0.2,
    },
    analyzers: {
        enabled: true,
        include: [],
        minGroupSize: 2,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    calcgraph_version: string;
    config_json: string;
    entry_count: number;
    report_json: string;
}
