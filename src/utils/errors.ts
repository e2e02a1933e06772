/**
 * Error taxonomy for parsing, macro resolution, evaluation and the entity model.
 * Every failure is a typed error surfaced to the caller; nothing here is retried.
 */

export type TdbErrorCode =
    | 'PARSE'
    | 'CYCLIC_MACRO'
    | 'UNKNOWN_MACRO'
    | 'STATE_VARIABLE_INVALID'
    | 'STATE_VARIABLE_OUT_OF_RANGE'
    | 'DOMAIN'
    | 'MODEL'
    | 'DATABASE_FROZEN';

export class TdbError extends Error {
    readonly code: TdbErrorCode;

    constructor(code: TdbErrorCode, message: string) {
        super(message);
        this.name = 'TdbError';
        this.code = code;
    }
}

/** Malformed function text or parameter descriptor */
export class ParseError extends TdbError {
    /** Character offset in the parsed text */
    readonly position: number;

    constructor(message: string, position: number) {
        super('PARSE', `${message} at position ${position}`);
        this.name = 'ParseError';
        this.position = position;
    }
}

export class CyclicMacroError extends TdbError {
    /** Reference chain, ending with the name that closes the cycle */
    readonly chain: readonly string[];

    constructor(chain: readonly string[]) {
        super('CYCLIC_MACRO', `Cyclic FUNCTION reference: ${chain.join(' -> ')}`);
        this.name = 'CyclicMacroError';
        this.chain = chain;
    }
}

export class UnknownMacroError extends TdbError {
    readonly macro: string;

    constructor(macro: string) {
        super('UNKNOWN_MACRO', `Undefined FUNCTION reference '${macro}'`);
        this.name = 'UnknownMacroError';
        this.macro = macro;
    }
}

export class StateVariableInvalidError extends TdbError {
    readonly variable: string;
    readonly value: number | undefined;

    constructor(variable: string, value: number | undefined, reason: string) {
        super('STATE_VARIABLE_INVALID', `State variable ${variable} = ${String(value)} is invalid: ${reason}`);
        this.name = 'StateVariableInvalidError';
        this.variable = variable;
        this.value = value;
    }
}

export class StateVariableOutOfRangeError extends TdbError {
    readonly variable: string;
    readonly value: number;
    readonly min: number;
    readonly max: number;

    constructor(variable: string, value: number, min: number, max: number) {
        super(
            'STATE_VARIABLE_OUT_OF_RANGE',
            `State variable ${variable} = ${value} is outside the declared range [${min}, ${max})`
        );
        this.name = 'StateVariableOutOfRangeError';
        this.variable = variable;
        this.value = value;
        this.min = min;
        this.max = max;
    }
}

/** An operator received an operand outside its domain, or produced a non-finite value */
export class DomainError extends TdbError {
    readonly operation: string;
    /** Every operand of the failing operation, left to right */
    readonly operands: readonly number[];

    constructor(operation: string, operands: readonly number[], message?: string) {
        super('DOMAIN', message ?? `${operation} is undefined for ${operands.join(', ')}`);
        this.name = 'DomainError';
        this.operation = operation;
        this.operands = operands;
    }
}

/** Entity data that violates a model invariant (duplicate constituent, bad stoichiometry, ...) */
export class ModelError extends TdbError {
    constructor(message: string) {
        super('MODEL', message);
        this.name = 'ModelError';
    }
}

export class DatabaseFrozenError extends TdbError {
    constructor(operation: string) {
        super('DATABASE_FROZEN', `Cannot ${operation}: the database is frozen`);
        this.name = 'DatabaseFrozenError';
    }
}
