/**
 * Barrel export for all shared types.
 */
export type {
    ExprNode,
    LiteralNode,
    SymbolNode,
    MacroNode,
    UnaryNode,
    BinaryNode,
    CallNode,
    PiecewiseNode,
    BinaryOperator,
    UnaryOperator,
    BuiltinFunction,
    Segment,
    ParsedFunction,
} from './ast.js';
export { DEFAULT_CONFIG } from './config.js';
export type { TdbConfig, LogLevel, RangePolicy } from './config.js';
