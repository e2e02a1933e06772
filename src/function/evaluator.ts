import type { ExprNode, RangePolicy, Segment } from '../types/index.js';
import { DomainError, StateVariableOutOfRangeError } from '../utils/errors.js';
import { readStateVariable, type ConditionsLookup } from './conditions.js';
import type { MacroTable } from './macros.js';
import { parseFunction, type ParseOptions } from './parser.js';

/**
 * Options for evaluating a piecewise function.
 */
export interface EvaluateOptions {
    /** State variable that selects the active segment (default `T`) */
    variable?: string;
    /** Behavior when no segment contains the value (default `strict`) */
    rangePolicy?: RangePolicy;
}

interface EvaluationContext {
    macros: MacroTable;
    conditions: ConditionsLookup;
    variable: string;
    rangePolicy: RangePolicy;
}

/**
 * Pick the segment whose `[lower, upper)` contains `value`.
 */
export function selectSegment<S extends Segment>(
    segments: readonly S[],
    variable: string,
    value: number,
    rangePolicy: RangePolicy = 'strict'
): S {
    for (const segment of segments) {
        if (value >= segment.lower && value < segment.upper) return segment;
    }

    const first = segments[0];
    const last = segments[segments.length - 1];
    if (!first || !last) {
        throw new StateVariableOutOfRangeError(variable, value, NaN, NaN);
    }
    if (rangePolicy === 'extrapolate') {
        return value < first.lower ? first : last;
    }
    throw new StateVariableOutOfRangeError(variable, value, first.lower, last.upper);
}

function checked(operation: string, operands: readonly number[], result: number): number {
    if (!Number.isFinite(result)) {
        throw new DomainError(
            operation,
            operands,
            `${operation} of ${operands.join(', ')} produced a non-finite result (${result})`
        );
    }
    return result;
}

function evaluateNode(node: ExprNode, context: EvaluationContext): number {
    switch (node.kind) {
        case 'literal':
            return node.value;

        case 'symbol':
            return readStateVariable(context.conditions, node.name);

        case 'macro':
            return evaluateNode(context.macros.resolve(node.name, new Set()), context);

        case 'piecewise': {
            const value = readStateVariable(context.conditions, context.variable);
            const segment = selectSegment(node.segments, context.variable, value, context.rangePolicy);
            return evaluateNode(segment.expression, context);
        }

        case 'unary': {
            const operand = evaluateNode(node.operand, context);
            return node.op === '-' ? -operand : operand;
        }

        case 'binary': {
            const left = evaluateNode(node.left, context);
            const right = evaluateNode(node.right, context);
            switch (node.op) {
                case '+':
                    return checked('+', [left, right], left + right);
                case '-':
                    return checked('-', [left, right], left - right);
                case '*':
                    return checked('*', [left, right], left * right);
                case '/':
                    if (right === 0) throw new DomainError('/', [left, right], 'Division by zero');
                    return checked('/', [left, right], left / right);
                case '**':
                    return checked('**', [left, right], left ** right);
            }
        }

        case 'call': {
            const [argument] = node.args;
            if (!argument) throw new DomainError(node.name, [], `${node.name} called without an argument`);
            const operand = evaluateNode(argument, context);
            switch (node.name) {
                case 'LN':
                    if (operand <= 0) throw new DomainError('LN', [operand]);
                    return Math.log(operand);
                case 'EXP':
                    return checked('EXP', [operand], Math.exp(operand));
            }
        }
    }
}

/**
 * Evaluate a piecewise function at the current conditions.
 *
 * The governing state variable is validated first, then the segment containing
 * it is selected and its expression evaluated. FUNCTION references go through
 * `macros`, each with a fresh visiting set.
 */
export function evaluate(
    segments: readonly Segment[],
    macros: MacroTable,
    conditions: ConditionsLookup,
    options: EvaluateOptions = {}
): number {
    const context: EvaluationContext = {
        macros,
        conditions,
        variable: (options.variable ?? 'T').toUpperCase(),
        rangePolicy: options.rangePolicy ?? 'strict',
    };
    const value = readStateVariable(conditions, context.variable);
    const segment = selectSegment(segments, context.variable, value, context.rangePolicy);
    return evaluateNode(segment.expression, context);
}

/**
 * Parse and evaluate in one step.
 */
export function evaluateFunction(
    text: string,
    macros: MacroTable,
    conditions: ConditionsLookup,
    options: EvaluateOptions & ParseOptions = {}
): number {
    return evaluate(parseFunction(text, options).segments, macros, conditions, options);
}
