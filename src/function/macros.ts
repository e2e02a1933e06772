import { DirectedGraph } from 'graphology';
import type { ExprNode, ParsedFunction, PiecewiseNode, Segment } from '../types/index.js';
import { CyclicMacroError, DatabaseFrozenError, UnknownMacroError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseFunction, type ParseOptions } from './parser.js';

interface MacroDefinition {
    /** Raw function text, when the macro was defined from text */
    source?: string;
    parsed: ParsedFunction;
}

/**
 * Collect the names of every FUNCTION referenced in an expression.
 */
export function collectMacroReferences(node: ExprNode, into: Set<string> = new Set()): Set<string> {
    switch (node.kind) {
        case 'literal':
        case 'symbol':
            break;
        case 'macro':
            into.add(node.name);
            break;
        case 'unary':
            collectMacroReferences(node.operand, into);
            break;
        case 'binary':
            collectMacroReferences(node.left, into);
            collectMacroReferences(node.right, into);
            break;
        case 'call':
            for (const arg of node.args) collectMacroReferences(arg, into);
            break;
        case 'piecewise':
            for (const segment of node.segments) collectMacroReferences(segment.expression, into);
            break;
    }
    return into;
}

/**
 * Named FUNCTION definitions and their resolution.
 *
 * Definitions are stored unexpanded. `resolve` substitutes references
 * recursively, tracking the names currently being expanded in a caller-owned
 * `visiting` set, and memoizes the result per name. A dependency graph
 * (edge A -> B when A references B) drives cache invalidation: redefining B
 * drops the cached resolution of B and of everything that reaches B.
 */
export class MacroTable {
    private readonly definitions = new Map<string, MacroDefinition>();
    private readonly resolved = new Map<string, PiecewiseNode>();
    private readonly graph = new DirectedGraph();
    private frozen = false;

    constructor(private readonly parseOptions: ParseOptions = {}) {}

    /**
     * Add or replace a FUNCTION definition.
     */
    define(name: string, definition: string | ParsedFunction): void {
        if (this.frozen) throw new DatabaseFrozenError('define function');
        const key = name.toUpperCase();
        const entry: MacroDefinition =
            typeof definition === 'string'
                ? { source: definition, parsed: parseFunction(definition, this.parseOptions) }
                : { parsed: definition };

        if (this.definitions.has(key)) {
            this.invalidate(key);
        }
        this.definitions.set(key, entry);

        this.graph.mergeNode(key);
        for (const edge of this.graph.outEdges(key)) {
            this.graph.dropEdge(edge);
        }
        const references = new Set<string>();
        for (const segment of entry.parsed.segments) {
            collectMacroReferences(segment.expression, references);
        }
        for (const reference of references) {
            this.graph.mergeNode(reference);
            this.graph.mergeEdge(key, reference);
        }

        getLogger().debug({ name: key, references: [...references] }, 'FUNCTION defined');
    }

    has(name: string): boolean {
        return this.definitions.has(name.toUpperCase());
    }

    /** The unexpanded definition */
    get(name: string): ParsedFunction | undefined {
        return this.definitions.get(name.toUpperCase())?.parsed;
    }

    /** Raw text the definition was parsed from, if it was defined from text */
    source(name: string): string | undefined {
        return this.definitions.get(name.toUpperCase())?.source;
    }

    names(): string[] {
        return [...this.definitions.keys()];
    }

    get size(): number {
        return this.definitions.size;
    }

    /** FUNCTIONs referenced directly by `name` */
    dependencies(name: string): string[] {
        const key = name.toUpperCase();
        return this.graph.hasNode(key) ? this.graph.outNeighbors(key).sort() : [];
    }

    /** FUNCTIONs that reference `name` directly */
    dependents(name: string): string[] {
        const key = name.toUpperCase();
        return this.graph.hasNode(key) ? this.graph.inNeighbors(key).sort() : [];
    }

    /**
     * Resolve `name` into a piecewise node with every reference substituted.
     *
     * @param visiting - names being expanded on the current path; shared across
     *   the recursion and restored on return
     * @throws CyclicMacroError when `name` is already being expanded
     * @throws UnknownMacroError when `name` (or anything it references) is undefined
     */
    resolve(name: string, visiting: Set<string> = new Set()): PiecewiseNode {
        const key = name.toUpperCase();
        if (visiting.has(key)) {
            throw new CyclicMacroError([...visiting, key]);
        }

        const cached = this.resolved.get(key);
        if (cached) return cached;

        const definition = this.definitions.get(key);
        if (!definition) {
            throw new UnknownMacroError(key);
        }

        visiting.add(key);
        try {
            const segments: Segment[] = definition.parsed.segments.map((segment) => ({
                lower: segment.lower,
                upper: segment.upper,
                expression: this.substitute(segment.expression, visiting),
            }));
            const node: PiecewiseNode = { kind: 'piecewise', name: key, segments };
            this.resolved.set(key, node);
            return node;
        } finally {
            visiting.delete(key);
        }
    }

    /**
     * Copy of `node` with every macro leaf replaced by its resolution.
     */
    substitute(node: ExprNode, visiting: Set<string> = new Set()): ExprNode {
        switch (node.kind) {
            case 'literal':
            case 'symbol':
            case 'piecewise':
                return node;
            case 'macro':
                return this.resolve(node.name, visiting);
            case 'unary':
                return { kind: 'unary', op: node.op, operand: this.substitute(node.operand, visiting) };
            case 'binary':
                return {
                    kind: 'binary',
                    op: node.op,
                    left: this.substitute(node.left, visiting),
                    right: this.substitute(node.right, visiting),
                };
            case 'call':
                return { kind: 'call', name: node.name, args: node.args.map((arg) => this.substitute(arg, visiting)) };
        }
    }

    /**
     * Resolve every definition once so that later evaluations only read the cache.
     * Definitions that fail (cycles, undefined references) are returned, not thrown;
     * evaluating them still fails with the same error.
     */
    prewarm(): Array<{ name: string; error: Error }> {
        const failures: Array<{ name: string; error: Error }> = [];
        for (const name of this.definitions.keys()) {
            try {
                this.resolve(name);
            } catch (error) {
                if (!(error instanceof CyclicMacroError || error instanceof UnknownMacroError)) throw error;
                failures.push({ name, error });
            }
        }
        getLogger().debug({ resolved: this.resolved.size, failed: failures.length }, 'FUNCTION cache prewarmed');
        return failures;
    }

    /**
     * Reject further definitions. Resolution still memoizes, so call
     * `prewarm()` first to make later reads cache hits.
     */
    freeze(): void {
        this.frozen = true;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /** Number of memoized resolutions */
    get cachedCount(): number {
        return this.resolved.size;
    }

    private invalidate(key: string): void {
        const stale = new Set<string>([key]);
        const queue = [key];
        while (queue.length > 0) {
            const current = queue.pop();
            if (current === undefined || !this.graph.hasNode(current)) continue;
            for (const dependent of this.graph.inNeighbors(current)) {
                if (!stale.has(dependent)) {
                    stale.add(dependent);
                    queue.push(dependent);
                }
            }
        }
        for (const name of stale) this.resolved.delete(name);
        getLogger().debug({ name: key, invalidated: [...stale] }, 'FUNCTION cache invalidated');
    }
}
