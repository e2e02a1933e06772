import type { BuiltinFunction, ExprNode, ParsedFunction, Segment } from '../types/index.js';
import { ParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { Lexer, type Punctuator, type Token } from './lexer.js';

/**
 * Options for parsing function text.
 */
export interface ParseOptions {
    /** Identifiers read as state variables. Everything else is a FUNCTION reference. */
    stateVariables?: readonly string[];
    /** Lower bound of the first segment when the text does not give one */
    defaultLowerBound?: number;
    /** Upper bound of the final segment when the text does not give one */
    defaultUpperBound?: number;
}

export const DEFAULT_STATE_VARIABLES: readonly string[] = ['T', 'P'];

/** Function names accepted in call position, with TDB aliases */
const BUILTINS: Record<string, BuiltinFunction> = {
    LN: 'LN',
    LOG: 'LN',
    EXP: 'EXP',
};

function isPunctuator(token: Token, value: Punctuator): boolean {
    return token.type === 'punctuator' && token.value === value;
}

function isKeyword(token: Token, keyword: string): boolean {
    return token.type === 'identifier' && token.value === keyword;
}

function canStartExpression(token: Token): boolean {
    return (
        token.type === 'number' ||
        token.type === 'identifier' ||
        isPunctuator(token, '(') ||
        isPunctuator(token, '+') ||
        isPunctuator(token, '-')
    );
}

function describe(token: Token): string {
    return token.type === 'eof' ? 'end of input' : `'${token.text}'`;
}

/**
 * Strip the `REF`/`REF:` keyword from the text between `N` and `!`.
 */
function extractCitation(raw: string): string | undefined {
    const citation = raw.trim().replace(/^REF(?::|\s+|$)\s*/i, '').trim();
    return citation.length > 0 ? citation : undefined;
}

/**
 * Recursive descent parser for TDB function bodies:
 *
 *   [lower] expr ; upper Y expr ; ... expr ; [upper] N [REF: citation] !
 */
class FunctionParser {
    private readonly lexer: Lexer;
    private readonly stateVariables: Set<string>;
    private readonly defaultLowerBound: number;
    private readonly defaultUpperBound: number;

    constructor(private readonly text: string, options: ParseOptions) {
        this.lexer = new Lexer(text);
        this.stateVariables = new Set(
            (options.stateVariables ?? DEFAULT_STATE_VARIABLES).map((name) => name.toUpperCase())
        );
        this.defaultLowerBound = options.defaultLowerBound ?? -Infinity;
        this.defaultUpperBound = options.defaultUpperBound ?? Infinity;
    }

    parse(): ParsedFunction {
        const segments: Segment[] = [];
        let lower = this.parseLeadingBound();

        for (;;) {
            const start = this.lexer.peek();
            if (!canStartExpression(start)) {
                throw new ParseError(`Expected expression, got ${describe(start)}`, start.start);
            }
            const expression = this.parseExpression();

            const delimiter = this.lexer.next();
            if (isPunctuator(delimiter, '!')) {
                segments.push(this.segment(lower, this.defaultUpperBound, expression, delimiter));
                this.expectEnd();
                return { segments };
            }
            if (isPunctuator(delimiter, ')')) {
                throw new ParseError("Unbalanced parentheses: unexpected ')'", delimiter.start);
            }
            if (!isPunctuator(delimiter, ';')) {
                throw new ParseError(`Expected ';' after expression, got ${describe(delimiter)}`, delimiter.start);
            }

            const after = this.lexer.peek();

            if (isPunctuator(after, '!')) {
                this.lexer.next();
                segments.push(this.segment(lower, this.defaultUpperBound, expression, after));
                this.expectEnd();
                return { segments };
            }

            if (isPunctuator(after, ',') || isKeyword(after, 'N')) {
                // ",,N" leaves the final upper bound at its default
                while (isPunctuator(this.lexer.peek(), ',')) this.lexer.next();
                this.expectKeyword('N');
                segments.push(this.segment(lower, this.defaultUpperBound, expression, after));
                return { segments, ...this.parseTerminator() };
            }

            if (after.type !== 'number') {
                throw new ParseError(`Expected upper bound after ';', got ${describe(after)}`, after.start);
            }
            this.lexer.next();
            const marker = this.lexer.next();

            if (isKeyword(marker, 'Y')) {
                segments.push(this.segment(lower, after.value, expression, after));
                lower = after.value;
                continue;
            }
            if (isKeyword(marker, 'N')) {
                segments.push(this.segment(lower, after.value, expression, after));
                return { segments, ...this.parseTerminator() };
            }
            throw new ParseError(`Expected 'Y' or 'N' after upper bound, got ${describe(marker)}`, marker.start);
        }
    }

    /**
     * A leading number is the first lower bound when the start of an expression
     * follows it, with or without whitespace between them (`298.15-7285.889+T`).
     * Otherwise it belongs to the first expression (`2*T`).
     */
    private parseLeadingBound(): number {
        const first = this.lexer.peek();
        if (first.type !== 'number') return this.defaultLowerBound;

        this.lexer.next();
        const second = this.lexer.peek();
        if (canStartExpression(second)) {
            return first.value;
        }
        this.lexer.rewind(first.start);
        return this.defaultLowerBound;
    }

    private segment(lower: number, upper: number, expression: ExprNode, at: Token): Segment {
        if (!(upper > lower)) {
            throw new ParseError(`Upper bound ${upper} must be greater than lower bound ${lower}`, at.start);
        }
        return { lower, upper, expression };
    }

    private parseTerminator(): { citation?: string } {
        const raw = this.lexer.readRawUntil('!');
        if (!raw) {
            throw new ParseError("Missing terminator '!'", this.text.length);
        }
        this.lexer.next();
        this.expectEnd();
        const citation = extractCitation(raw.text);
        return citation === undefined ? {} : { citation };
    }

    private expectEnd(): void {
        const token = this.lexer.peek();
        if (token.type !== 'eof') {
            throw new ParseError(`Unexpected ${describe(token)} after terminator '!'`, token.start);
        }
    }

    private expectKeyword(keyword: string): void {
        const token = this.lexer.next();
        if (!isKeyword(token, keyword)) {
            throw new ParseError(`Expected '${keyword}', got ${describe(token)}`, token.start);
        }
    }

    // ─── Expressions ──────────────────────────────────────────

    private parseExpression(): ExprNode {
        let left = this.parseTerm();
        for (;;) {
            const token = this.lexer.peek();
            if (token.type !== 'punctuator' || (token.value !== '+' && token.value !== '-')) return left;
            this.lexer.next();
            left = { kind: 'binary', op: token.value, left, right: this.parseTerm() };
        }
    }

    private parseTerm(): ExprNode {
        let left = this.parseUnary();
        for (;;) {
            const token = this.lexer.peek();
            if (token.type !== 'punctuator' || (token.value !== '*' && token.value !== '/')) return left;
            this.lexer.next();
            left = { kind: 'binary', op: token.value, left, right: this.parseUnary() };
        }
    }

    private parseUnary(): ExprNode {
        const token = this.lexer.peek();
        if (token.type === 'punctuator' && (token.value === '+' || token.value === '-')) {
            this.lexer.next();
            return { kind: 'unary', op: token.value, operand: this.parseUnary() };
        }
        return this.parsePower();
    }

    private parsePower(): ExprNode {
        const base = this.parsePrimary();
        if (isPunctuator(this.lexer.peek(), '**')) {
            this.lexer.next();
            return { kind: 'binary', op: '**', left: base, right: this.parseUnary() };
        }
        return base;
    }

    private parsePrimary(): ExprNode {
        const token = this.lexer.next();

        if (token.type === 'number') {
            return { kind: 'literal', value: token.value };
        }

        if (token.type === 'identifier') {
            if (isPunctuator(this.lexer.peek(), '(')) {
                return this.parseCall(token);
            }
            if (this.stateVariables.has(token.value)) {
                return { kind: 'symbol', name: token.value };
            }
            return { kind: 'macro', name: token.value };
        }

        if (isPunctuator(token, '(')) {
            const inner = this.parseExpression();
            const close = this.lexer.next();
            if (!isPunctuator(close, ')')) {
                throw new ParseError(`Unbalanced parentheses: expected ')', got ${describe(close)}`, close.start);
            }
            return inner;
        }

        if (token.type === 'eof') {
            throw new ParseError('Unexpected end of input', token.start);
        }
        throw new ParseError(`Unexpected ${describe(token)}`, token.start);
    }

    private parseCall(name: Extract<Token, { type: 'identifier' }>): ExprNode {
        const builtin = BUILTINS[name.value];
        if (!builtin) {
            throw new ParseError(`Unknown function '${name.text}'`, name.start);
        }
        this.lexer.next();

        const args: ExprNode[] = [this.parseExpression()];
        while (isPunctuator(this.lexer.peek(), ',')) {
            this.lexer.next();
            args.push(this.parseExpression());
        }
        const close = this.lexer.next();
        if (!isPunctuator(close, ')')) {
            throw new ParseError(`Unbalanced parentheses: expected ')', got ${describe(close)}`, close.start);
        }
        if (args.length !== 1) {
            throw new ParseError(`${builtin} takes 1 argument, got ${args.length}`, name.start);
        }
        return { kind: 'call', name: builtin, args };
    }
}

/**
 * Parse a function body into ordered segments and an optional citation.
 *
 * @example
 * parseFunction('298.15 1; 1000 Y T;,,N REF: 0 !')
 * // segments [298.15, 1000) -> 1 and [1000, Infinity) -> T, citation '0'
 */
export function parseFunction(text: string, options: ParseOptions = {}): ParsedFunction {
    const parsed = new FunctionParser(text, options).parse();
    getLogger().debug({ segments: parsed.segments.length, citation: parsed.citation }, 'Function parsed');
    return parsed;
}

// ─── Parameter descriptors ───────────────────────────────

/**
 * The part of a PARAMETER statement before the function body,
 * e.g. `G(BCC_A2,FE,CR:VA;0)`.
 */
export interface ParameterDescriptor {
    type: string;
    phase: string;
    suffix: string;
    constituentArray: string[][];
    degree: number;
}

const DESCRIPTOR_PATTERN = /^\s*([A-Za-z][A-Za-z0-9]*)\s*\(\s*([A-Za-z][A-Za-z0-9_]*)\s*,([^;()]*)(?:;\s*([+-]?\d+)\s*)?\)\s*$/;

/**
 * Parse a parameter descriptor. The phase name is split at its first underscore
 * into phase and suffix (`BCC_A2` -> `BCC` + `A2`).
 */
export function parseParameterDescriptor(text: string): ParameterDescriptor {
    const match = DESCRIPTOR_PATTERN.exec(text);
    if (!match) {
        throw new ParseError(`Malformed parameter descriptor '${text.trim()}'`, 0);
    }
    const [, type = '', phaseName = '', constituents = '', degree] = match;
    const constituentsOffset = text.indexOf(',') + 1;

    const constituentArray = constituents.split(':').map((sublattice) =>
        sublattice.split(',').map((species) => {
            const name = species.trim().toUpperCase();
            if (!/^[A-Z0-9_*%+\-/]+$/.test(name)) {
                throw new ParseError(`Malformed constituent '${species.trim()}' in '${text.trim()}'`, constituentsOffset);
            }
            return name;
        })
    );

    const upperPhase = phaseName.toUpperCase();
    const underscore = upperPhase.indexOf('_');

    return {
        type: type.toUpperCase(),
        phase: underscore === -1 ? upperPhase : upperPhase.slice(0, underscore),
        suffix: underscore === -1 ? '' : upperPhase.slice(underscore + 1),
        constituentArray,
        degree: degree === undefined ? 0 : parseInt(degree, 10),
    };
}
