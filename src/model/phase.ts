import { DatabaseFrozenError, ModelError } from '../utils/errors.js';
import type { Parameter } from './parameter.js';
import type { Sublattice } from './sublattice.js';

/**
 * A phase: an ordered sequence of sublattices plus the parameters that belong to it.
 * Sublattice order defines the index used by parameter constituent arrays.
 */
export class Phase {
    readonly name: string;
    private readonly subls: readonly Sublattice[];
    private readonly params: Parameter[] = [];
    private frozen = false;

    constructor(name: string, sublattices: readonly Sublattice[]) {
        if (sublattices.length === 0) {
            throw new ModelError(`Phase ${name} needs at least one sublattice`);
        }
        this.name = name.toUpperCase();
        this.subls = Object.freeze([...sublattices]);
    }

    /** Copy of the sublattice sequence */
    sublattices(): Sublattice[] {
        return [...this.subls];
    }

    sublattice(index: number): Sublattice | undefined {
        return this.subls[index];
    }

    get sublatticeCount(): number {
        return this.subls.length;
    }

    parameters(): IterableIterator<Parameter> {
        return this.params.values();
    }

    get parameterCount(): number {
        return this.params.length;
    }

    /** Whether this phase is the one a parameter names: `BCC_A2`, or `BCC` for a phase declared without its suffix */
    accepts(parameter: Parameter): boolean {
        return parameter.phasename === this.name || parameter.phase === this.name;
    }

    /**
     * Attach a parameter to this phase after checking its constituent array
     * against the sublattices.
     */
    addParameter(parameter: Parameter): void {
        if (this.frozen) throw new DatabaseFrozenError(`add parameter to phase ${this.name}`);
        if (!this.accepts(parameter)) {
            throw new ModelError(`Parameter ${parameter.descriptor} belongs to phase ${parameter.phasename}, not ${this.name}`);
        }
        if (parameter.constituentArray.length !== this.subls.length) {
            throw new ModelError(
                `Parameter ${parameter.descriptor} has ${parameter.constituentArray.length} sublattices, phase ${this.name} has ${this.subls.length}`
            );
        }
        parameter.constituentArray.forEach((species, index) => {
            const sublattice = this.subls[index];
            for (const name of species) {
                if (name !== '*' && !sublattice?.has(name)) {
                    throw new ModelError(
                        `Parameter ${parameter.descriptor}: '${name}' is not a constituent of sublattice ${index} of ${this.name}`
                    );
                }
            }
        });
        this.params.push(parameter);
    }

    /** Reject further parameters */
    freeze(): void {
        this.frozen = true;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /** Sum of site ratios, the formula-unit size */
    get totalSites(): number {
        return this.subls.reduce((sum, sublattice) => sum + sublattice.siteRatio, 0);
    }
}
