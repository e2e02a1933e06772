import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LogLevel, type RangePolicy, type TdbConfig } from '../types/index.js';
import type { EvaluateOptions } from '../function/evaluator.js';
import type { ParseOptions } from '../function/parser.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const RANGE_POLICIES: readonly RangePolicy[] = ['strict', 'extrapolate'];

/**
 * Validate a log level given on the command line.
 */
export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
    if (!level) {
        throw new Error(`Invalid log level '${value}'. Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the keys of a loaded config file that have the expected shape.
 * Unknown keys and ill-typed values are dropped with a warning.
 */
export function sanitizeConfig(raw: unknown): Partial<TdbConfig> {
    if (!isRecord(raw)) {
        getLogger().warn('Config file is not an object, ignoring it');
        return {};
    }

    const config: Partial<TdbConfig> = {};
    const rejected: string[] = [];

    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'logLevel': {
                const level = LOG_LEVELS.find((l) => l === value);
                if (level) config.logLevel = level;
                else rejected.push(key);
                break;
            }
            case 'jsonLogs':
                if (typeof value === 'boolean') config.jsonLogs = value;
                else rejected.push(key);
                break;
            case 'stateVariables':
                if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
                    config.stateVariables = value.map((v) => v.toUpperCase());
                } else rejected.push(key);
                break;
            case 'defaultLowerBound':
            case 'defaultUpperBound':
                if (value === null || typeof value === 'number') config[key] = value;
                else rejected.push(key);
                break;
            case 'stateVariable':
                if (typeof value === 'string') config.stateVariable = value.toUpperCase();
                else rejected.push(key);
                break;
            case 'rangePolicy': {
                const policy = RANGE_POLICIES.find((p) => p === value);
                if (policy) config.rangePolicy = policy;
                else rejected.push(key);
                break;
            }
            default:
                rejected.push(key);
        }
    }

    if (rejected.length > 0) {
        getLogger().warn({ keys: rejected }, 'Ignoring unknown or invalid config keys');
    }
    return config;
}

/**
 * Load configuration from tdbcore.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<TdbConfig> | null> {
    const explorer = cosmiconfig('tdbcore', {
        searchPlaces: ['tdbcore.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(cliFlags: Partial<TdbConfig>, searchFrom?: string): Promise<TdbConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
    };
}

/**
 * Parser options derived from a configuration. The governing state variable
 * is always parsed as a state variable.
 */
export function toParseOptions(config: TdbConfig): ParseOptions {
    return {
        stateVariables: [...new Set([...config.stateVariables, config.stateVariable])],
        defaultLowerBound: config.defaultLowerBound ?? -Infinity,
        defaultUpperBound: config.defaultUpperBound ?? Infinity,
    };
}

/**
 * Evaluator options derived from a configuration.
 */
export function toEvaluateOptions(config: TdbConfig): EvaluateOptions {
    return {
        variable: config.stateVariable,
        rangePolicy: config.rangePolicy,
    };
}
