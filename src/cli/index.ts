#!/usr/bin/env node
import { Command } from 'commander';
import { parseLogLevel, resolveConfig, toEvaluateOptions, toParseOptions } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { StateConditions } from '../function/conditions.js';
import { evaluate } from '../function/evaluator.js';
import { MacroTable } from '../function/macros.js';
import { parseFunction } from '../function/parser.js';
import { DatabaseArchive } from '../storage/archive.js';
import type { TdbConfig } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOptions {
    variable?: string;
    extrapolate?: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

function parseTemperature(value: string, previous: number[] = []): number[] {
    const temperature = Number(value);
    if (Number.isNaN(temperature)) {
        throw new Error(`Not a number: ${value}`);
    }
    return [...previous, temperature];
}

function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}

/**
 * CLI flags that were actually given, so they only override the config file
 * where the user set them.
 */
function cliConfig(opts: CommonOptions): Partial<TdbConfig> {
    const config: Partial<TdbConfig> = {};
    if (opts.variable) config.stateVariable = opts.variable.toUpperCase();
    if (opts.extrapolate) config.rangePolicy = 'extrapolate';
    if (opts.logLevel) config.logLevel = parseLogLevel(opts.logLevel);
    if (opts.jsonLogs) config.jsonLogs = true;
    return config;
}

async function setup(opts: CommonOptions): Promise<TdbConfig> {
    const config = await resolveConfig(cliConfig(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

const program = new Command();

program
    .name('tdbcore')
    .description('Parse and evaluate CALPHAD thermodynamic database functions.')
    .version(VERSION);

// ─── EVAL command ─────────────────────────────────────────

program
    .command('eval')
    .description('Evaluate function text at one or more temperatures')
    .argument('<text>', "Function text, e.g. \"298.15 1; 1000 Y T;,,N REF: 0 !\"")
    .requiredOption('-t, --temperature <value>', 'Temperature (repeatable)', parseTemperature)
    .option('-m, --macro <definition>', 'FUNCTION definition NAME=TEXT (repeatable)', collect)
    .option('--variable <symbol>', 'Governing state variable')
    .option('--extrapolate', 'Evaluate the nearest segment outside the declared range', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (text: string, opts: CommonOptions & { temperature: number[]; macro?: string[] }) => {
        const config = await setup(opts);
        const logger = getLogger();

        try {
            const parseOptions = toParseOptions(config);
            const macros = new MacroTable(parseOptions);
            for (const definition of opts.macro ?? []) {
                const separator = definition.indexOf('=');
                if (separator <= 0) {
                    throw new Error(`Invalid --macro '${definition}', expected NAME=TEXT`);
                }
                macros.define(definition.slice(0, separator).trim(), definition.slice(separator + 1));
            }

            const { segments, citation } = parseFunction(text, parseOptions);
            const evaluateOptions = toEvaluateOptions(config);
            const conditions = new StateConditions();
            for (const temperature of opts.temperature) {
                conditions.set(config.stateVariable, temperature);
                const value = evaluate(segments, macros, conditions, evaluateOptions);
                console.log(`${config.stateVariable}=${temperature}\t${value}`);
            }
            if (citation) console.log(`REF: ${citation}`);
        } catch (error) {
            logger.error({ error }, 'Evaluation failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show archive statistics')
    .requiredOption('-i, --input <path>', 'Archive path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .action(async (opts: CommonOptions & { input: string }) => {
        await setup(opts);

        try {
            const archive = new DatabaseArchive(opts.input, { mustExist: true });
            const stats = archive.getStats();
            archive.close();

            console.log('\nThermodynamic Database Archive\n');
            console.log(`  Elements:   ${stats.elements}`);
            console.log(`  Species:    ${stats.species}`);
            console.log(`  Phases:     ${stats.phases}`);
            console.log(`  Functions:  ${stats.functions}`);
            console.log(`  Parameters: ${stats.parameters}`);

            if (Object.keys(stats.parametersByType).length > 0) {
                console.log('\n  Parameter Types:');
                for (const [type, count] of Object.entries(stats.parametersByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            getLogger().error({ error }, 'Inspect failed');
            process.exit(1);
        }
    });

// ─── PARAM command ────────────────────────────────────────

program
    .command('param')
    .description('Evaluate the archived parameters of a phase')
    .requiredOption('-i, --input <path>', 'Archive path')
    .requiredOption('-p, --phase <name>', 'Phase name, including any suffix (e.g. BCC_A2)')
    .requiredOption('-t, --temperature <value>', 'Temperature (repeatable)', parseTemperature)
    .option('--type <type>', 'Only parameters of this type (G, L, TC, ...)')
    .option('--variable <symbol>', 'Governing state variable')
    .option('--extrapolate', 'Evaluate the nearest segment outside the declared range', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .action(
        async (opts: CommonOptions & { input: string; phase: string; temperature: number[]; type?: string }) => {
            const config = await setup(opts);
            const logger = getLogger();

            try {
                const archive = new DatabaseArchive(opts.input, { mustExist: true });
                const database = archive.load({
                    parse: toParseOptions(config),
                    evaluate: toEvaluateOptions(config),
                });
                archive.close();

                const type = opts.type?.toUpperCase();
                const view = database.parameters.buildView(
                    (parameter) => parameter.phasename === opts.phase.toUpperCase() && (!type || parameter.type === type)
                );
                if (view.size === 0) {
                    logger.warn({ phase: opts.phase, type }, 'No matching parameters');
                }

                for (const parameter of view) {
                    for (const temperature of opts.temperature) {
                        const value = database.evaluateAt(parameter, temperature);
                        console.log(`${parameter.descriptor}\t${config.stateVariable}=${temperature}\t${value}`);
                    }
                }
            } catch (error) {
                logger.error({ error }, 'Parameter evaluation failed');
                process.exit(1);
            }
        }
    );

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
