/**
 * Barrel export for all shared types.
 */
export type { Entry, RawEntryData } from './entry.js';
export { UNCLUSTERED_KEY, formulaOf, clusterKeyOf } from './entry.js';
export { RelationshipKind, ADJACENCY_KINDS, ANALYZER_KINDS, edgeKey, isRelationshipKind } from './edge.js';
export type { RelationshipCandidate, GraphEdge, EdgeProperties, EdgePropertyValue } from './edge.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CalcGraphConfig,
    LogLevel,
    AnalyzerName,
    AnalyzerSettings,
    ScoringWeights,
    RunRecord,
} from './config.js';
export type { InferenceReport, FailedEdge } from './report.js';
export type { GraphStore } from './graph-store.js';
export type { EntrySource } from './source-adapter.js';
export type { RelationshipAnalyzer, AnalyzerOptions } from './analyzer.js';
