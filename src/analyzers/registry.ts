import type { Entry, RelationshipAnalyzer, RelationshipCandidate, AnalyzerOptions } from '../types/index.js';
import { formulaOf } from '../types/index.js';
import { containsElement } from '../chem/formula.js';
import { clampConfidence } from '../inference/scoring.js';
import { ConfigurationError, ErrorCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Options for one registry run.
 */
export interface AnalyzerRunOptions extends AnalyzerOptions {
    /** Analyzer names to run; empty or absent runs every registered analyzer */
    include?: readonly string[];
    /** Restrict analyzers to entries whose formula contains this element */
    elementFilter?: string;
}

/**
 * Registry of independent relationship analyzers.
 *
 * The registry applies the population filter, clamps every confidence into
 * [0, 1] and drops self-loops; each analyzer keeps its own scoring policy.
 */
export class AnalyzerRegistry {
    private readonly analyzers = new Map<string, RelationshipAnalyzer>();

    register(analyzer: RelationshipAnalyzer): this {
        if (this.analyzers.has(analyzer.name)) {
            throw new ConfigurationError(`Analyzer already registered: ${analyzer.name}`, ErrorCode.ANALYZER_DUPLICATE);
        }
        this.analyzers.set(analyzer.name, analyzer);
        return this;
    }

    get(name: string): RelationshipAnalyzer | undefined {
        return this.analyzers.get(name);
    }

    /**
     * Registered analyzers in registration order.
     */
    list(): RelationshipAnalyzer[] {
        return [...this.analyzers.values()];
    }

    /**
     * Resolve a selection of analyzer names. Unknown names are a configuration error.
     */
    select(include?: readonly string[]): RelationshipAnalyzer[] {
        if (!include || include.length === 0) {
            return this.list();
        }

        return include.map((name) => {
            const analyzer = this.analyzers.get(name);
            if (!analyzer) {
                throw new ConfigurationError(`Unknown analyzer: ${name}`, ErrorCode.ANALYZER_NOT_FOUND, {
                    available: [...this.analyzers.keys()],
                });
            }
            return analyzer;
        });
    }

    /**
     * Run the selected analyzers over a population, in registry order.
     */
    run(entries: readonly Entry[], options: AnalyzerRunOptions): RelationshipCandidate[] {
        const selected = this.select(options.include);
        const { elementFilter } = options;
        const population = elementFilter
            ? entries.filter((entry) => containsElement(formulaOf(entry), elementFilter))
            : entries;

        const candidates: RelationshipCandidate[] = [];
        for (const analyzer of selected) {
            const produced = analyzer.analyze(population, options);
            let selfLoops = 0;

            for (const candidate of produced) {
                if (candidate.from_id === candidate.to_id) {
                    selfLoops++;
                    continue;
                }
                candidates.push({ ...candidate, confidence: clampConfidence(candidate.confidence) });
            }

            if (selfLoops > 0) {
                getLogger().warn({ analyzer: analyzer.name, selfLoops }, 'Dropped self-loop candidates');
            }
            getLogger().debug({ analyzer: analyzer.name, candidates: produced.length - selfLoops }, 'Analyzer finished');
        }

        return candidates;
    }
}
