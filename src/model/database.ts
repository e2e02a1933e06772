import type { RangePolicy } from '../types/index.js';
import { StateConditions, type ConditionsLookup } from '../function/conditions.js';
import { evaluate, type EvaluateOptions } from '../function/evaluator.js';
import { MacroTable } from '../function/macros.js';
import type { ParseOptions } from '../function/parser.js';
import { ParameterStore } from '../storage/parameter-store.js';
import { DatabaseFrozenError, ModelError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { Element } from './element.js';
import { Parameter } from './parameter.js';
import type { Phase } from './phase.js';
import type { Species } from './species.js';

export interface DatabaseOptions {
    parse?: ParseOptions;
    evaluate?: EvaluateOptions;
}

/**
 * A thermodynamic database: elements, species, phases, FUNCTION macros and
 * the global parameter store.
 *
 * Built once, then frozen. After `freeze()` the database, its FUNCTION table,
 * its parameter store and its phases all throw `DatabaseFrozenError` on mutation,
 * so every read after that point sees the same state.
 */
export class ThermoDatabase {
    private readonly elementMap = new Map<string, Element>();
    private readonly speciesMap = new Map<string, Species>();
    private readonly phaseMap = new Map<string, Phase>();
    readonly functions: MacroTable;
    readonly parameters = new ParameterStore();
    private frozen = false;

    constructor(private readonly options: DatabaseOptions = {}) {
        this.functions = new MacroTable(options.parse);
    }

    // ─── Load phase ───────────────────────────────────────────

    addElement(element: Element): void {
        this.assertMutable('add element');
        if (this.elementMap.has(element.name)) {
            throw new ModelError(`Duplicate element ${element.name}`);
        }
        this.elementMap.set(element.name, element);
    }

    addSpecies(species: Species): void {
        this.assertMutable('add species');
        if (this.speciesMap.has(species.name)) {
            throw new ModelError(`Duplicate species ${species.name}`);
        }
        for (const element of species.elements()) {
            if (!this.elementMap.has(element)) {
                throw new ModelError(`Species ${species.name} uses undeclared element ${element}`);
            }
        }
        this.speciesMap.set(species.name, species);
    }

    addPhase(phase: Phase): void {
        this.assertMutable('add phase');
        if (this.phaseMap.has(phase.name)) {
            throw new ModelError(`Duplicate phase ${phase.name}`);
        }
        phase.sublattices().forEach((sublattice, index) => {
            for (const constituent of sublattice.constituents) {
                if (!this.speciesMap.has(constituent)) {
                    throw new ModelError(`Phase ${phase.name} sublattice ${index}: undeclared species ${constituent}`);
                }
            }
        });
        this.phaseMap.set(phase.name, phase);
    }

    /** Add or replace a FUNCTION definition */
    defineFunction(name: string, text: string): void {
        this.assertMutable('define function');
        this.functions.define(name, text);
    }

    /**
     * Attach a parameter to its phase and insert it into the global store.
     * Accepts a built parameter or a descriptor/function-text pair.
     */
    addParameter(parameter: Parameter): Parameter;
    addParameter(descriptor: string, functionText: string): Parameter;
    addParameter(parameterOrDescriptor: Parameter | string, functionText?: string): Parameter {
        this.assertMutable('add parameter');
        let parameter: Parameter;
        if (typeof parameterOrDescriptor === 'string') {
            if (functionText === undefined) {
                throw new ModelError(`Parameter ${parameterOrDescriptor} has no function text`);
            }
            parameter = Parameter.fromText(parameterOrDescriptor, functionText, this.options.parse);
        } else {
            parameter = parameterOrDescriptor;
        }

        const phase = this.phaseMap.get(parameter.phasename) ?? this.phaseMap.get(parameter.phase);
        if (!phase) {
            throw new ModelError(`Parameter ${parameter.descriptor} refers to undeclared phase ${parameter.phasename}`);
        }
        phase.addParameter(parameter);
        this.parameters.insert(parameter);
        return parameter;
    }

    /**
     * End the load phase: resolve every FUNCTION once and reject further mutation.
     */
    freeze(): void {
        if (this.frozen) return;
        const failures = this.functions.prewarm();
        for (const { name, error } of failures) {
            getLogger().warn({ name, error: error.message }, 'FUNCTION cannot be resolved');
        }
        this.functions.freeze();
        this.parameters.freeze();
        for (const phase of this.phaseMap.values()) phase.freeze();
        this.frozen = true;
        getLogger().debug(this.stats(), 'Database frozen');
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    // ─── Queries ──────────────────────────────────────────────

    element(name: string): Element | undefined {
        return this.elementMap.get(name.toUpperCase());
    }

    species(name: string): Species | undefined {
        return this.speciesMap.get(name.toUpperCase());
    }

    phase(name: string): Phase | undefined {
        return this.phaseMap.get(name.toUpperCase());
    }

    elements(): Element[] {
        return [...this.elementMap.values()];
    }

    allSpecies(): Species[] {
        return [...this.speciesMap.values()];
    }

    phases(): Phase[] {
        return [...this.phaseMap.values()];
    }

    /**
     * Evaluate a parameter's function at the given conditions, using the
     * database's FUNCTION table.
     */
    evaluateParameter(parameter: Parameter, conditions: ConditionsLookup, options: EvaluateOptions = {}): number {
        return evaluate(parameter.segments, this.functions, conditions, { ...this.options.evaluate, ...options });
    }

    /** Evaluate a parameter at a single temperature */
    evaluateAt(parameter: Parameter, temperature: number, rangePolicy?: RangePolicy): number {
        const variable = this.options.evaluate?.variable ?? 'T';
        return this.evaluateParameter(
            parameter,
            new StateConditions({ [variable]: temperature }),
            rangePolicy ? { rangePolicy } : {}
        );
    }

    stats(): { elements: number; species: number; phases: number; functions: number; parameters: number } {
        return {
            elements: this.elementMap.size,
            species: this.speciesMap.size,
            phases: this.phaseMap.size,
            functions: this.functions.size,
            parameters: this.parameters.size,
        };
    }

    private assertMutable(operation: string): void {
        if (this.frozen) throw new DatabaseFrozenError(operation);
    }
}
