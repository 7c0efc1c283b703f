import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CalcGraphConfig } from '../types/index.js';
import { ConfigurationError, ErrorCode, errorMessage } from './errors.js';
import { getLogger } from './logger.js';

// ─── Schemas ──────────────────────────────────────────────

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const AnalyzerNameSchema = z.enum([
    'periodic-trend',
    'cluster-size-series',
    'isoelectronic',
    'parameter-study',
    'same-material',
]);

const ScoringSchema = z.object({
    base: z.number().min(0),
    formulaMatch: z.number().min(0),
    fileHandoff: z.number().min(0),
    compatibleStages: z.number().min(0),
});

const AnalyzerSettingsSchema = z.object({
    enabled: z.boolean(),
    include: z.array(AnalyzerNameSchema),
    minGroupSize: z.number().int().min(2),
});

/**
 * Full configuration, validated after merging.
 */
export const ConfigSchema = z.object({
    input: z.string().min(1).optional(),
    out: z.string().min(1),
    dryRun: z.boolean(),
    minConfidence: z.number().min(0).max(1),
    clusterFilter: z.string().min(1).optional(),
    elementFilter: z.string().regex(/^[A-Z][a-z]?$/, 'must be an element symbol such as "Au"').optional(),
    batchSize: z.number().int().positive(),
    logLevel: LogLevelSchema,
    jsonLogs: z.boolean(),
    scoring: ScoringSchema,
    analyzers: AnalyzerSettingsSchema,
});

/**
 * Partial configuration as found in a config file, env vars, or CLI flags.
 */
export const PartialConfigSchema = ConfigSchema.partial().extend({
    scoring: ScoringSchema.partial().optional(),
    analyzers: AnalyzerSettingsSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof PartialConfigSchema>;

// ─── Sources ──────────────────────────────────────────────

/**
 * Load configuration from calcgraph.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<PartialConfig | null> {
    const explorer = cosmiconfig('calcgraph', {
        searchPlaces: ['calcgraph.config.json'],
    });

    const result = await explorer.search(searchFrom).catch((error: unknown) => {
        throw new ConfigurationError(`Failed to read config file: ${errorMessage(error)}`);
    });
    if (!result || result.isEmpty) {
        return null;
    }

    const filepath = result.filepath;
    const parsed = PartialConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid config file ${filepath}: ${formatIssues(parsed.error)}`, ErrorCode.CONFIGURATION_INVALID, {
            path: filepath,
        });
    }

    getLogger().debug({ path: filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const config: PartialConfig = {};

    const db = env['CALCGRAPH_DB'];
    if (db) {
        config.out = db;
    }

    const minConfidence = env['CALCGRAPH_MIN_CONFIDENCE'];
    if (minConfidence) {
        const value = Number(minConfidence);
        if (Number.isNaN(value)) {
            throw new ConfigurationError(`CALCGRAPH_MIN_CONFIDENCE is not a number: ${minConfidence}`);
        }
        config.minConfidence = value;
    }

    const logLevel = env['CALCGRAPH_LOG_LEVEL'];
    if (logLevel) {
        const parsed = LogLevelSchema.safeParse(logLevel);
        if (!parsed.success) {
            throw new ConfigurationError(`CALCGRAPH_LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}`);
        }
        config.logLevel = parsed.data;
    }

    return config;
}

// ─── Merge ────────────────────────────────────────────────

/**
 * Merge configuration layers and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(
    cliFlags: PartialConfig,
    envConfig: PartialConfig = {},
    fileConfig: PartialConfig | null = null
): CalcGraphConfig {
    const merged = {
        ...DEFAULT_CONFIG,
        out: './calcgraph.db',
        ...compact<PartialConfig>(fileConfig ?? {}),
        ...compact(envConfig),
        ...compact(cliFlags),
        // Deep merge nested objects
        scoring: {
            ...DEFAULT_CONFIG.scoring,
            ...compact<NonNullable<PartialConfig['scoring']>>(fileConfig?.scoring ?? {}),
            ...compact<NonNullable<PartialConfig['scoring']>>(cliFlags.scoring ?? {}),
        },
        analyzers: {
            ...DEFAULT_CONFIG.analyzers,
            ...compact<NonNullable<PartialConfig['analyzers']>>(fileConfig?.analyzers ?? {}),
            ...compact<NonNullable<PartialConfig['analyzers']>>(cliFlags.analyzers ?? {}),
        },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Resolve the effective configuration for a run.
 * @param cliFlags - Flags given on the command line
 * @param searchFrom - Directory to look for calcgraph.config.json in (defaults to cwd)
 */
export async function resolveConfig(
    cliFlags: PartialConfig,
    searchFrom?: string
): Promise<CalcGraphConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();
    return mergeConfig(cliFlags, envConfig, fileConfig);
}

// ─── Helpers ──────────────────────────────────────────────

/**
 * Drop undefined values so they do not shadow lower-precedence layers.
 */
function compact<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = { ...value };
    for (const key in result) {
        if (result[key] === undefined) {
            delete result[key];
        }
    }
    return result;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}
