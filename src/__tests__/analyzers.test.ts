import { describe, it, expect } from 'vitest';
import {
    AnalyzerRegistry,
    createDefaultRegistry,
    PeriodicTrendAnalyzer,
    ClusterSizeSeriesAnalyzer,
    IsoelectronicAnalyzer,
    ParameterStudyAnalyzer,
    SameMaterialAnalyzer,
} from '../analyzers/index.js';
import { ConfigurationError, ErrorCode } from '../utils/errors.js';
import { RelationshipKind, type Entry, type RelationshipAnalyzer, type RelationshipCandidate } from '../types/index.js';
import { makeEntry } from './helpers/entries.js';

const OPTIONS = { minGroupSize: 2 };

function pairs(candidates: RelationshipCandidate[]): Array<[string, string]> {
    return candidates.map((c) => [c.from_id, c.to_id]);
}

describe('PeriodicTrendAnalyzer', () => {
    const analyzer = new PeriodicTrendAnalyzer();

    it('should link same-size clusters down a group', () => {
        const candidates = analyzer.analyze([
            makeEntry('k3', { formula: 'K3' }),
            makeEntry('li3', { formula: 'Li3' }),
            makeEntry('na3', { formula: 'Na3' }),
            makeEntry('li2', { formula: 'Li2' }),
        ]);

        expect(pairs(candidates)).toEqual([
            ['li3', 'na3'],
            ['na3', 'k3'],
        ]);
        expect(candidates[0]).toEqual({
            from_id: 'li3',
            to_id: 'na3',
            kind: RelationshipKind.PERIODIC_TREND,
            confidence: 0.9,
            cluster_key: '',
            properties: {
                family: 'alkali_metals',
                trend: 'group',
                size: 3,
                from_element: 'Li',
                to_element: 'Na',
                reasoning: 'alkali_metals group series: Li3 → Na3',
            },
        });
    });

    it('should link across a d-block period with lower confidence', () => {
        const candidates = analyzer.analyze([makeEntry('ti', { formula: 'Ti2' }), makeEntry('sc', { formula: 'Sc2' })]);
        expect(pairs(candidates)).toEqual([['sc', 'ti']]);
        expect(candidates[0]?.confidence).toBe(0.85);
        expect(candidates[0]?.properties['trend']).toBe('period');
    });

    it('should ignore heteronuclear and unparseable formulas', () => {
        expect(analyzer.analyze([makeEntry('a', { formula: 'NaCl' }), makeEntry('b', { formula: 'Fe(CO)5' })])).toEqual([]);
    });
});

describe('ClusterSizeSeriesAnalyzer', () => {
    const analyzer = new ClusterSizeSeriesAnalyzer();

    it('should link growing homonuclear clusters and their family series', () => {
        const candidates = analyzer.analyze([
            makeEntry('c6', { formula: 'C6' }),
            makeEntry('c2', { formula: 'C2' }),
            makeEntry('c4', { formula: 'C4' }),
        ]);

        expect(candidates.map((c) => [c.from_id, c.to_id, c.confidence, c.properties['series_type']])).toEqual([
            ['c2', 'c4', 0.95, 'same_element'],
            ['c4', 'c6', 0.95, 'same_element'],
            ['c2', 'c4', 0.85, 'element_family'],
            ['c4', 'c6', 0.85, 'element_family'],
        ]);
        expect(candidates[0]?.properties).toEqual({
            series_type: 'same_element',
            element: 'C',
            smaller_size: 2,
            larger_size: 4,
            smaller_formula: 'C2',
            larger_formula: 'C4',
        });
    });

    it('should follow the primary element into a family series', () => {
        const candidates = analyzer.analyze([makeEntry('na3', { formula: 'Na3' }), makeEntry('li2', { formula: 'Li2' })]);
        expect(candidates).toHaveLength(1);
        expect(candidates[0]).toMatchObject({
            from_id: 'li2',
            to_id: 'na3',
            properties: { series_type: 'element_family', family: 'alkali_metals', smaller_size: 2, larger_size: 3 },
        });
    });

    it('should represent each size by its first entry', () => {
        const candidates = analyzer.analyze([
            makeEntry('au4-a', { formula: 'Au4' }),
            makeEntry('au4-b', { formula: 'Au4' }),
            makeEntry('au8', { formula: 'Au8' }),
        ]);
        expect(pairs(candidates)).toEqual([
            ['au4-a', 'au8'],
            ['au4-a', 'au8'],
        ]);
    });
});

describe('IsoelectronicAnalyzer', () => {
    it('should chain distinct formulas with equal electron counts', () => {
        const candidates = new IsoelectronicAnalyzer().analyze([
            makeEntry('n2', { formula: 'N2' }),
            makeEntry('si', { formula: 'Si' }),
            makeEntry('co', { formula: 'CO' }),
            makeEntry('n2-again', { formula: 'N2' }),
            makeEntry('water', { formula: 'H2O' }),
        ]);

        expect(candidates).toEqual([
            {
                from_id: 'co',
                to_id: 'n2',
                kind: RelationshipKind.ISOELECTRONIC,
                confidence: 0.7,
                cluster_key: '',
                properties: { electrons: 14, from_formula: 'CO', to_formula: 'N2' },
            },
            {
                from_id: 'n2',
                to_id: 'si',
                kind: RelationshipKind.ISOELECTRONIC,
                confidence: 0.7,
                cluster_key: '',
                properties: { electrons: 14, from_formula: 'N2', to_formula: 'Si' },
            },
        ]);
    });

    it('should treat reordered formulas of one composition as the same species', () => {
        const analyzer = new IsoelectronicAnalyzer();
        expect(
            analyzer.analyze([makeEntry('water', { formula: 'H2O' }), makeEntry('water-reordered', { formula: 'OH2' })])
        ).toEqual([]);

        const candidates = analyzer.analyze([
            makeEntry('water-reordered', { formula: 'OH2' }),
            makeEntry('ammonia', { formula: 'NH3' }),
            makeEntry('water', { formula: 'H2O' }),
        ]);
        expect(pairs(candidates)).toEqual([['water-reordered', 'ammonia']]);
        expect(candidates[0]?.properties).toEqual({ electrons: 10, from_formula: 'OH2', to_formula: 'NH3' });
    });
});

describe('ParameterStudyAnalyzer', () => {
    const analyzer = new ParameterStudyAnalyzer();
    const study = [
        makeEntry('p2', { type: 'scf', formula: 'H2O', cluster_key: 'U' }),
        makeEntry('p1', { type: 'scf', formula: 'H2O', cluster_key: 'U' }),
        makeEntry('p3', { type: 'scf', formula: 'H2O', cluster_key: 'U' }),
        makeEntry('other', { type: 'dos', formula: 'H2O', cluster_key: 'U' }),
        makeEntry('blank', { type: 'scf', cluster_key: 'U' }),
    ];

    it('should chain repeated calculations in id order', () => {
        const candidates = analyzer.analyze(study, OPTIONS);
        expect(pairs(candidates)).toEqual([
            ['p1', 'p2'],
            ['p2', 'p3'],
        ]);
        expect(candidates[1]).toMatchObject({
            kind: RelationshipKind.PARAMETER_STUDY,
            confidence: 0.9,
            cluster_key: 'U',
            properties: { formula: 'H2O', calculation_type: 'scf', step: 2, study_size: 3 },
        });
    });

    it('should skip groups below the minimum size', () => {
        expect(analyzer.analyze(study, { minGroupSize: 4 })).toEqual([]);
    });

    it('should not chain unclustered entries', () => {
        const unclustered = [
            makeEntry('lone-1', { type: 'scf', formula: 'H2O' }),
            makeEntry('lone-2', { type: 'scf', formula: 'H2O' }),
        ];
        expect(analyzer.analyze(unclustered, OPTIONS)).toEqual([]);
    });
});

describe('SameMaterialAnalyzer', () => {
    it('should link the first entry of each cluster sharing a formula', () => {
        const candidates = new SameMaterialAnalyzer().analyze([
            makeEntry('e1', { formula: 'H2O', cluster_key: 'U1' }),
            makeEntry('e2', { formula: 'H2O', cluster_key: 'U1' }),
            makeEntry('e3', { formula: 'H2O', cluster_key: 'U2' }),
            makeEntry('e4', { formula: 'H2O', cluster_key: 'U3' }),
            makeEntry('e5', { formula: 'H2O' }),
        ]);

        expect(pairs(candidates)).toEqual([
            ['e1', 'e3'],
            ['e1', 'e4'],
            ['e3', 'e4'],
        ]);
        expect(candidates[2]?.properties).toEqual({ formula: 'H2O', from_cluster: 'U2', to_cluster: 'U3' });
        expect(candidates[2]?.confidence).toBe(0.8);
    });
});

describe('AnalyzerRegistry', () => {
    class StubAnalyzer implements RelationshipAnalyzer {
        readonly kind = RelationshipKind.SAME_MATERIAL;
        readonly description = 'stub';

        constructor(
            readonly name: string,
            private readonly output: RelationshipCandidate[]
        ) {}

        analyze(_entries: readonly Entry[]): RelationshipCandidate[] {
            return this.output;
        }
    }

    const candidate = (from_id: string, to_id: string, confidence: number): RelationshipCandidate => ({
        from_id,
        to_id,
        kind: RelationshipKind.SAME_MATERIAL,
        confidence,
        cluster_key: '',
        properties: {},
    });

    it('should list the built-in analyzers in registration order', () => {
        expect(createDefaultRegistry().list().map((a) => a.name)).toEqual([
            'periodic-trend',
            'cluster-size-series',
            'isoelectronic',
            'parameter-study',
            'same-material',
        ]);
    });

    it('should reject duplicate names', () => {
        const registry = new AnalyzerRegistry().register(new StubAnalyzer('stub', []));
        expect(() => registry.register(new StubAnalyzer('stub', []))).toThrow(ConfigurationError);
    });

    it('should reject unknown selections', () => {
        let caught: unknown;
        try {
            createDefaultRegistry().select(['nope']);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught).toMatchObject({ code: ErrorCode.ANALYZER_NOT_FOUND });
    });

    it('should clamp confidences and drop self-loops', () => {
        const registry = new AnalyzerRegistry().register(
            new StubAnalyzer('stub', [candidate('a', 'b', 1.4), candidate('a', 'a', 0.9), candidate('b', 'c', -0.2)])
        );
        const result = registry.run([], OPTIONS);
        expect(result.map((c) => [c.from_id, c.to_id, c.confidence])).toEqual([
            ['a', 'b', 1],
            ['b', 'c', 0],
        ]);
    });

    it('should run only the selected analyzers', () => {
        const registry = new AnalyzerRegistry()
            .register(new StubAnalyzer('one', [candidate('a', 'b', 0.5)]))
            .register(new StubAnalyzer('two', [candidate('c', 'd', 0.5)]));
        expect(pairs(registry.run([], { ...OPTIONS, include: ['two'] }))).toEqual([['c', 'd']]);
    });

    it('should restrict the population by element symbol', () => {
        const entries: Entry[] = [
            makeEntry('li3', { formula: 'Li3' }),
            makeEntry('na3', { formula: 'Na3' }),
            makeEntry('k3', { formula: 'K3' }),
        ];
        const registry = createDefaultRegistry();
        expect(registry.run(entries, { ...OPTIONS, include: ['periodic-trend'] })).toHaveLength(2);
        expect(registry.run(entries, { ...OPTIONS, include: ['periodic-trend'], elementFilter: 'Na' })).toEqual([]);
    });
});
