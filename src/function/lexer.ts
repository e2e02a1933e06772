import { ParseError } from '../utils/errors.js';

export type Punctuator = '+' | '-' | '*' | '/' | '**' | '(' | ')' | ',' | ';' | ':' | '!';

export type Token =
    | { type: 'number'; value: number; text: string; start: number }
    | { type: 'identifier'; value: string; text: string; start: number }
    | { type: 'punctuator'; value: Punctuator; text: string; start: number }
    | { type: 'eof'; value: ''; text: ''; start: number };

const SINGLE_PUNCTUATORS: readonly Punctuator[] = ['+', '-', '/', '(', ')', ',', ';', ':', '!'];

function isSinglePunctuator(ch: string | undefined): ch is Punctuator {
    return SINGLE_PUNCTUATORS.some((p) => p === ch);
}

function isDigit(ch: string | undefined): boolean {
    return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string | undefined): boolean {
    return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string | undefined): boolean {
    return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

/**
 * On-demand tokenizer for function text.
 *
 * The parser pulls tokens one at a time because the citation tail after `N`/`REF`
 * is free text: `readRawUntil('!')` hands back the characters verbatim instead
 * of tokenizing them.
 */
export class Lexer {
    private pos = 0;
    private buffered: Token | null = null;

    constructor(private readonly input: string) {}

    peek(): Token {
        if (!this.buffered) {
            this.buffered = this.scan();
        }
        return this.buffered;
    }

    next(): Token {
        const token = this.peek();
        this.buffered = null;
        return token;
    }

    /**
     * Return the raw text up to (not including) `stop` and leave the lexer on `stop`.
     * Returns null when `stop` never occurs.
     */
    readRawUntil(stop: string): { text: string; start: number } | null {
        if (this.buffered) {
            this.pos = this.buffered.start;
            this.buffered = null;
        }
        const end = this.input.indexOf(stop, this.pos);
        if (end === -1) return null;
        const start = this.pos;
        this.pos = end;
        return { text: this.input.slice(start, end), start };
    }

    /** Move back to `offset`, discarding any peeked token. */
    rewind(offset: number): void {
        this.pos = offset;
        this.buffered = null;
    }

    /** Offset just past the last consumed character */
    get offset(): number {
        return this.buffered ? this.buffered.start : this.pos;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length) {
            const ch = this.input[this.pos];
            if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
                this.pos++;
            } else if (ch === '\\' && (this.input[this.pos + 1] === '\n' || this.input.startsWith('\r\n', this.pos + 1))) {
                // Line continuation
                this.pos += this.input[this.pos + 1] === '\n' ? 2 : 3;
            } else {
                break;
            }
        }
    }

    private scan(): Token {
        this.skipWhitespace();
        const start = this.pos;

        if (this.pos >= this.input.length) {
            return { type: 'eof', value: '', text: '', start };
        }

        const ch = this.input[this.pos];

        if (isDigit(ch) || (ch === '.' && isDigit(this.input[this.pos + 1]))) {
            return this.scanNumber(start);
        }

        if (isIdentifierStart(ch)) {
            while (isIdentifierPart(this.input[this.pos])) this.pos++;
            const text = this.input.slice(start, this.pos);
            // Trailing '#' marks a FUNCTION reference in TDB files
            if (this.input[this.pos] === '#') this.pos++;
            return { type: 'identifier', value: text.toUpperCase(), text: this.input.slice(start, this.pos), start };
        }

        if (ch === '*') {
            if (this.input[this.pos + 1] === '*') {
                this.pos += 2;
                return { type: 'punctuator', value: '**', text: '**', start };
            }
            this.pos++;
            return { type: 'punctuator', value: '*', text: '*', start };
        }

        if (isSinglePunctuator(ch)) {
            this.pos++;
            return { type: 'punctuator', value: ch, text: ch, start };
        }

        throw new ParseError(`Unexpected character '${ch}'`, start);
    }

    private scanNumber(start: number): Token {
        while (isDigit(this.input[this.pos])) this.pos++;
        if (this.input[this.pos] === '.') {
            this.pos++;
            while (isDigit(this.input[this.pos])) this.pos++;
        }
        const marker = this.input[this.pos];
        if (marker === 'E' || marker === 'e') {
            let cursor = this.pos + 1;
            if (this.input[cursor] === '+' || this.input[cursor] === '-') cursor++;
            if (!isDigit(this.input[cursor])) {
                throw new ParseError(`Malformed number '${this.input.slice(start, cursor)}'`, start);
            }
            while (isDigit(this.input[cursor])) cursor++;
            this.pos = cursor;
        }
        if (isIdentifierStart(this.input[this.pos])) {
            throw new ParseError(`Malformed number '${this.input.slice(start, this.pos + 1)}'`, start);
        }
        const text = this.input.slice(start, this.pos);
        return { type: 'number', value: Number(text), text, start };
    }
}

/**
 * Eagerly tokenize a whole string, up to and including the `eof` token.
 */
export function tokenize(input: string): Token[] {
    const lexer = new Lexer(input);
    const tokens: Token[] = [];
    for (;;) {
        const token = lexer.next();
        tokens.push(token);
        if (token.type === 'eof') return tokens;
    }
}
