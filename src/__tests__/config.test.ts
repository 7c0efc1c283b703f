import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mergeConfig, loadEnvVars, resolveConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

describe('mergeConfig', () => {
    it('should fill defaults', () => {
        const config = mergeConfig({});
        expect(config.out).toBe('./calcgraph.db');
        expect(config.minConfidence).toBe(0);
        expect(config.batchSize).toBe(500);
        expect(config.dryRun).toBe(false);
        expect(config.logLevel).toBe('info');
        expect(config.input).toBeUndefined();
    });

    it('should apply precedence CLI > env > file > defaults', () => {
        expect(mergeConfig({ minConfidence: 0.4 }, { minConfidence: 0.3 }, { minConfidence: 0.2 }).minConfidence).toBe(0.4);
        expect(mergeConfig({}, { minConfidence: 0.3 }, { minConfidence: 0.2 }).minConfidence).toBe(0.3);
        expect(mergeConfig({}, {}, { minConfidence: 0.2 }).minConfidence).toBe(0.2);
    });

    it('should not let unset CLI flags shadow lower layers', () => {
        const config = mergeConfig({ out: undefined, minConfidence: undefined }, { out: 'env.db' }, { minConfidence: 0.2 });
        expect(config.out).toBe('env.db');
        expect(config.minConfidence).toBe(0.2);
    });

    it('should deep-merge scoring and analyzer settings', () => {
        const config = mergeConfig(
            { analyzers: { include: ['isoelectronic'] } },
            {},
            { scoring: { base: 0.4 }, analyzers: { minGroupSize: 3 } }
        );
        expect(config.scoring).toEqual({ base: 0.4, formulaMatch: 0.3, fileHandoff: 0.2, compatibleStages: 0.2 });
        expect(config.analyzers).toEqual({ enabled: true, include: ['isoelectronic'], minGroupSize: 3 });
    });

    it('should reject invalid values', () => {
        expect(() => mergeConfig({ minConfidence: 1.5 })).toThrow(ConfigurationError);
        expect(() => mergeConfig({ batchSize: 0 })).toThrow(ConfigurationError);
        expect(() => mergeConfig({ elementFilter: 'gold' })).toThrow(ConfigurationError);
    });
});

describe('loadEnvVars', () => {
    it('should read calcgraph variables', () => {
        expect(
            loadEnvVars({
                CALCGRAPH_DB: 'env.db',
                CALCGRAPH_MIN_CONFIDENCE: '0.25',
                CALCGRAPH_LOG_LEVEL: 'debug',
                UNRELATED: 'x',
            })
        ).toEqual({ out: 'env.db', minConfidence: 0.25, logLevel: 'debug' });
    });

    it('should return nothing when unset', () => {
        expect(loadEnvVars({})).toEqual({});
    });

    it('should reject malformed values', () => {
        expect(() => loadEnvVars({ CALCGRAPH_MIN_CONFIDENCE: 'high' })).toThrow(ConfigurationError);
        expect(() => loadEnvVars({ CALCGRAPH_LOG_LEVEL: 'trace' })).toThrow(ConfigurationError);
    });
});

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'calcgraph-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should read calcgraph.config.json', async () => {
        fs.writeFileSync(
            path.join(tmpDir, 'calcgraph.config.json'),
            JSON.stringify({ minConfidence: 0.6, analyzers: { include: ['same-material'] } })
        );

        const config = await resolveConfig({ out: 'cli.db' }, tmpDir);
        expect(config.minConfidence).toBe(0.6);
        expect(config.analyzers.include).toEqual(['same-material']);
        expect(config.out).toBe('cli.db');
    });

    it('should reject an invalid config file', async () => {
        fs.writeFileSync(path.join(tmpDir, 'calcgraph.config.json'), JSON.stringify({ batchSize: -1 }));
        await expect(resolveConfig({}, tmpDir)).rejects.toThrow(ConfigurationError);
    });
});
