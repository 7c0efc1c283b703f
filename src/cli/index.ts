#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, AnalyzerNameSchema, LogLevelSchema, type PartialConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { buildGraph, CALCGRAPH_VERSION } from '../builder/graph-builder.js';
import { createDefaultRegistry } from '../analyzers/index.js';
import { exportGraph, isExportFormat, EXPORT_FORMATS, EXPORT_EXTENSIONS } from '../exporters/export.js';
import { SqliteGraphStore } from '../storage/database.js';
import type { AnalyzerName, LogLevel } from '../types/index.js';

interface InferFlags {
    input?: string;
    out?: string;
    minConfidence?: number;
    cluster?: string;
    element?: string;
    analyzers?: AnalyzerName[] | false;
    minGroupSize?: number;
    dryRun?: boolean;
    batchSize?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ExportFlags {
    input: string;
    format: string;
    out?: string;
}

interface InspectFlags {
    input: string;
}

// ─── Argument parsers ─────────────────────────────────────

function parseConfidence(value: string): number {
    const parsed = Number(value);
    if (Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
        throw new InvalidArgumentError('Expected a number between 0 and 1.');
    }
    return parsed;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseAnalyzerList(value: string): AnalyzerName[] {
    const names = value.split(',').map((name) => name.trim()).filter((name) => name !== '');
    const parsed = AnalyzerNameSchema.array().safeParse(names);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Expected a comma-separated list of: ${AnalyzerNameSchema.options.join(', ')}.`);
    }
    return parsed.data;
}

function parseLogLevel(value: string): LogLevel {
    const parsed = LogLevelSchema.safeParse(value);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(', ')}.`);
    }
    return parsed.data;
}

/**
 * Map CLI flags onto a partial config. Flags the user did not pass stay
 * undefined so config-file and env values show through.
 */
function flagsToConfig(flags: InferFlags): PartialConfig {
    const analyzers: NonNullable<PartialConfig['analyzers']> = {};
    if (flags.analyzers === false) {
        analyzers.enabled = false;
    } else if (flags.analyzers !== undefined) {
        analyzers.include = flags.analyzers;
    }
    if (flags.minGroupSize !== undefined) {
        analyzers.minGroupSize = flags.minGroupSize;
    }

    return {
        input: flags.input,
        out: flags.out,
        minConfidence: flags.minConfidence,
        clusterFilter: flags.cluster,
        elementFilter: flags.element,
        dryRun: flags.dryRun,
        batchSize: flags.batchSize,
        logLevel: flags.logLevel,
        jsonLogs: flags.jsonLogs,
        analyzers,
    };
}

const program = new Command();

program
    .name('calcgraph')
    .description('Infer relationship graphs between computational-chemistry calculation entries.')
    .version(CALCGRAPH_VERSION);

// ─── INFER command ────────────────────────────────────────

program
    .command('infer')
    .description('Infer edges from a JSON entry file and upsert them into a graph database')
    .option('-i, --input <path>', 'JSON entry file (array, or { "data": [...] })')
    .option('-o, --out <path>', 'Output database path (default ./calcgraph.db)')
    .option('--min-confidence <n>', 'Drop candidates below this confidence', parseConfidence)
    .option('--cluster <key>', 'Only infer within this cluster')
    .option('--element <symbol>', 'Only run analyzers over entries containing this element')
    .option('--analyzers <names>', 'Comma-separated analyzers to run (default: all)', parseAnalyzerList)
    .option('--no-analyzers', 'Skip the analyzers; adjacency edges only')
    .option('--min-group-size <n>', 'Smallest parameter-study group', parsePositiveInt)
    .option('--dry-run', 'Infer into an in-memory graph; nothing is written')
    .option('--batch-size <n>', 'Upserts per batch', parsePositiveInt)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (flags: InferFlags) => {
        try {
            const config = await resolveConfig(flagsToConfig(flags));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const report = await buildGraph(config);
            getLogger().info(
                {
                    considered: report.candidatesConsidered,
                    deduplicated: report.candidatesDeduplicated,
                    belowThreshold: report.candidatesBelowThreshold,
                    upserted: report.edgesUpserted,
                    failed: report.edgesFailed.length,
                    edgesByKind: report.edgesByKind,
                },
                'Inference report'
            );

            if (report.edgesFailed.length > 0) {
                process.exitCode = 2;
            }
        } catch (error) {
            getLogger().error({ err: error }, 'Inference failed');
            process.exitCode = 1;
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description(`Export graph to ${EXPORT_FORMATS.join(', ')}`)
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .action((flags: ExportFlags) => {
        const format = flags.format.toLowerCase();

        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exitCode = 1;
            return;
        }

        const outputPath = flags.out ?? flags.input.replace(/\.db$/, '') + EXPORT_EXTENSIONS[format];

        try {
            exportGraph(flags.input, outputPath, format);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            getLogger().error({ err: error }, 'Export failed');
            process.exitCode = 1;
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((flags: InspectFlags) => {
        try {
            const db = new SqliteGraphStore(flags.input, { mustExist: true });
            const stats = db.getStats();
            db.close();

            console.log('\ncalcgraph database statistics\n');
            console.log(`  Entries:  ${stats.entries}`);
            console.log(`  Clusters: ${stats.clusters}`);
            console.log(`  Edges:    ${stats.edges}`);
            console.log(`  Runs:     ${stats.runs}`);

            if (Object.keys(stats.edgesByKind).length > 0) {
                console.log('\n  Edge kinds:');
                for (const [kind, count] of Object.entries(stats.edgesByKind)) {
                    console.log(`    ${kind}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Inspect failed');
            process.exitCode = 1;
        }
    });

// ─── ANALYZERS command ────────────────────────────────────

program
    .command('analyzers')
    .description('List the registered relationship analyzers')
    .action(() => {
        for (const analyzer of createDefaultRegistry().list()) {
            console.log(`  ${analyzer.name.padEnd(22)}${analyzer.kind.padEnd(22)}${analyzer.description}`);
        }
    });

await program.parseAsync();
