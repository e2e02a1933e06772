/**
 * Expression tree for the TDB function language.
 * Produced by the parser, rewritten by the macro resolver, walked by the evaluator.
 */

/** Arithmetic operators accepted between two operands */
export type BinaryOperator = '+' | '-' | '*' | '/' | '**';

/** Prefix operators */
export type UnaryOperator = '+' | '-';

/** Built-in functions callable from an expression */
export type BuiltinFunction = 'LN' | 'EXP';

/** Real literal, e.g. `-7285.889` or `1.70109E-07` */
export interface LiteralNode {
    kind: 'literal';
    value: number;
}

/** Reference to a state variable looked up in the conditions (`T`, `P`) */
export interface SymbolNode {
    kind: 'symbol';
    name: string;
}

/** Reference to a named FUNCTION, expanded by the macro resolver */
export interface MacroNode {
    kind: 'macro';
    name: string;
}

export interface UnaryNode {
    kind: 'unary';
    op: UnaryOperator;
    operand: ExprNode;
}

export interface BinaryNode {
    kind: 'binary';
    op: BinaryOperator;
    left: ExprNode;
    right: ExprNode;
}

export interface CallNode {
    kind: 'call';
    name: BuiltinFunction;
    args: ExprNode[];
}

/**
 * A resolved macro: the referenced FUNCTION's own segments, with every macro
 * leaf already substituted. Only the resolver creates these.
 */
export interface PiecewiseNode {
    kind: 'piecewise';
    name: string;
    segments: readonly Segment[];
}

export type ExprNode =
    | LiteralNode
    | SymbolNode
    | MacroNode
    | UnaryNode
    | BinaryNode
    | CallNode
    | PiecewiseNode;

/**
 * One piece of a piecewise function, valid on the half-open range `[lower, upper)`
 * of the governing state variable.
 */
export interface Segment {
    lower: number;
    upper: number;
    expression: ExprNode;
}

/**
 * Result of parsing a function body: ordered segments plus the optional
 * citation captured from the `REF` tail.
 */
export interface ParsedFunction {
    segments: Segment[];
    citation?: string;
}
