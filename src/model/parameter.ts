import type { ParsedFunction, Segment } from '../types/index.js';
import { ModelError } from '../utils/errors.js';
import { parseFunction, parseParameterDescriptor, type ParseOptions } from '../function/parser.js';

/** Constituent species names, one list per sublattice; `*` matches any species */
export type ConstituentArray = readonly (readonly string[])[];

export interface ParameterData {
    phase: string;
    /** Disambiguates structurally distinct parameter sets (B2, A2, L12, ...) */
    suffix?: string;
    /** Parameter type tag: G, L, TC, BMAGN, ... */
    type: string;
    constituentArray: ConstituentArray;
    /** Redlich-Kister term order; only meaningful for interaction parameters */
    degree?: number;
    function: ParsedFunction;
    /** Raw function text the segments were parsed from */
    source?: string;
}

/**
 * A single model term of a phase.
 *
 * `phase` and `suffix` are fixed at construction, so the derived `phasename`
 * used as a store key always agrees with them.
 */
export class Parameter {
    readonly phase: string;
    readonly suffix: string;
    readonly type: string;
    readonly constituentArray: ConstituentArray;
    readonly degree: number;
    readonly segments: readonly Segment[];
    readonly citation: string | undefined;
    readonly source: string | undefined;
    /** `phase`, or `phase_suffix` when a suffix is present */
    readonly phasename: string;

    constructor(data: ParameterData) {
        const degree = data.degree ?? 0;
        if (!Number.isInteger(degree) || degree < 0) {
            throw new ModelError(`Invalid Redlich-Kister degree ${degree}`);
        }
        if (data.constituentArray.length === 0) {
            throw new ModelError('Parameter needs at least one sublattice in its constituent array');
        }

        this.phase = data.phase.toUpperCase();
        this.suffix = (data.suffix ?? '').toUpperCase();
        this.type = data.type.toUpperCase();
        this.constituentArray = Object.freeze(
            data.constituentArray.map((sublattice) => Object.freeze(sublattice.map((name) => name.toUpperCase())))
        );
        this.degree = degree;
        this.segments = Object.freeze([...data.function.segments]);
        this.citation = data.function.citation;
        this.source = data.source;
        this.phasename = this.suffix === '' ? this.phase : `${this.phase}_${this.suffix}`;
        Object.freeze(this);
    }

    /**
     * Build a parameter from its descriptor and function text,
     * e.g. `('L(LIQUID,AL,FE;1)', '298.15 -1000+2*T; 6000 N !')`.
     */
    static fromText(descriptor: string, functionText: string, options: ParseOptions = {}): Parameter {
        const parsed = parseParameterDescriptor(descriptor);
        return new Parameter({
            ...parsed,
            function: parseFunction(functionText, options),
            source: functionText,
        });
    }

    /** Descriptor in TDB notation, e.g. `G(BCC_A2,FE:VA;0)` */
    get descriptor(): string {
        const constituents = this.constituentArray.map((sublattice) => sublattice.join(',')).join(':');
        return `${this.type}(${this.phasename},${constituents};${this.degree})`;
    }

    /**
     * Whether the parameter applies to a sublattice occupation: every species it
     * names must be present on the corresponding sublattice.
     */
    appliesTo(occupation: ConstituentArray): boolean {
        if (occupation.length !== this.constituentArray.length) return false;
        return this.constituentArray.every((required, index) => {
            const occupied = occupation[index] ?? [];
            return required.every((species) => species === '*' || occupied.includes(species));
        });
    }
}
