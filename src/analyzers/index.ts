import { AnalyzerRegistry } from './registry.js';
import { PeriodicTrendAnalyzer } from './periodic-trend.js';
import { ClusterSizeSeriesAnalyzer } from './cluster-size-series.js';
import { IsoelectronicAnalyzer } from './isoelectronic.js';
import { ParameterStudyAnalyzer } from './parameter-study.js';
import { SameMaterialAnalyzer } from './same-material.js';

export { AnalyzerRegistry, type AnalyzerRunOptions } from './registry.js';
export { PeriodicTrendAnalyzer, ClusterSizeSeriesAnalyzer, IsoelectronicAnalyzer, ParameterStudyAnalyzer, SameMaterialAnalyzer };

/**
 * Registry holding every built-in analyzer.
 */
export function createDefaultRegistry(): AnalyzerRegistry {
    return new AnalyzerRegistry()
        .register(new PeriodicTrendAnalyzer())
        .register(new ClusterSizeSeriesAnalyzer())
        .register(new IsoelectronicAnalyzer())
        .register(new ParameterStudyAnalyzer())
        .register(new SameMaterialAnalyzer());
}
