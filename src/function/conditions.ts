import { StateVariableInvalidError } from '../utils/errors.js';

/**
 * Read access to the current state-variable values (temperature, pressure, ...).
 * The evaluator only ever reads through this interface.
 */
export interface ConditionsLookup {
    get(symbol: string): number | undefined;
}

/**
 * Physical domain of a state variable beyond plain finiteness.
 * - `positive-normal`: > 0 and not subnormal
 * - `positive`: > 0
 * - `any`: every finite value
 */
export type StateVariableDomain = 'positive-normal' | 'positive' | 'any';

/** Temperature must be a normal positive number; pressure must be positive. */
export const STATE_VARIABLE_DOMAINS: Readonly<Record<string, StateVariableDomain>> = {
    T: 'positive-normal',
    P: 'positive',
};

/** Smallest positive normal double (2^-1022) */
const MIN_NORMAL = 2.2250738585072014e-308;

export function domainOf(variable: string): StateVariableDomain {
    return STATE_VARIABLE_DOMAINS[variable] ?? 'any';
}

/**
 * Read a state variable and check it against its domain.
 * Throws `StateVariableInvalidError` when it is unset, non-finite or outside the domain.
 */
export function readStateVariable(conditions: ConditionsLookup, variable: string): number {
    const value = conditions.get(variable);
    if (value === undefined) {
        throw new StateVariableInvalidError(variable, value, 'not set');
    }
    if (!Number.isFinite(value)) {
        throw new StateVariableInvalidError(variable, value, 'not finite');
    }

    switch (domainOf(variable)) {
        case 'positive-normal':
            if (value <= 0) throw new StateVariableInvalidError(variable, value, 'must be positive');
            if (value < MIN_NORMAL) throw new StateVariableInvalidError(variable, value, 'subnormal');
            break;
        case 'positive':
            if (value <= 0) throw new StateVariableInvalidError(variable, value, 'must be positive');
            break;
        case 'any':
            break;
    }
    return value;
}

/**
 * Map-backed conditions. Symbols are stored upper-case, matching the parser.
 */
export class StateConditions implements ConditionsLookup {
    private readonly values = new Map<string, number>();

    constructor(initial: Record<string, number> = {}) {
        for (const [symbol, value] of Object.entries(initial)) {
            this.set(symbol, value);
        }
    }

    get(symbol: string): number | undefined {
        return this.values.get(symbol.toUpperCase());
    }

    set(symbol: string, value: number): this {
        this.values.set(symbol.toUpperCase(), value);
        return this;
    }

    delete(symbol: string): boolean {
        return this.values.delete(symbol.toUpperCase());
    }

    clear(): void {
        this.values.clear();
    }

    /** Copy with one value replaced, for sweeping a variable without mutating shared conditions */
    with(symbol: string, value: number): StateConditions {
        const copy = new StateConditions();
        for (const [key, existing] of this.values) copy.values.set(key, existing);
        return copy.set(symbol, value);
    }
}
