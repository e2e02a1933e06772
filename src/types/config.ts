/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * What the evaluator does when the state variable lies outside every segment.
 * `strict` throws; `extrapolate` evaluates the nearest end segment.
 */
export type RangePolicy = 'strict' | 'extrapolate';

/**
 * Full tdb-core configuration merged from CLI flags and the config file.
 */
export interface TdbConfig {
    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Parsing
    /** Symbols parsed as state variables; every other identifier is a FUNCTION reference */
    stateVariables: string[];
    /** Lower bound of the first segment when the text omits it (null = unbounded) */
    defaultLowerBound: number | null;
    /** Upper bound of the final segment when the text omits it (null = unbounded) */
    defaultUpperBound: number | null;

    // Evaluation
    /** State variable that selects the active segment */
    stateVariable: string;
    rangePolicy: RangePolicy;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TdbConfig = {
    logLevel: 'info',
    jsonLogs: false,
    stateVariables: ['T', 'P'],
    defaultLowerBound: null,
    defaultUpperBound: null,
    stateVariable: 'T',
    rangePolicy: 'strict',
};
