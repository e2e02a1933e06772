import { ModelError } from '../utils/errors.js';

/**
 * One site of a phase's crystal structure.
 */
export class Sublattice {
    /** Site stoichiometric coefficient */
    readonly siteRatio: number;
    private readonly names: readonly string[];

    constructor(siteRatio: number, constituents: readonly string[] = []) {
        if (!Number.isFinite(siteRatio) || siteRatio < 0) {
            throw new ModelError(`Invalid site ratio ${siteRatio}`);
        }
        const normalized = constituents.map((name) => name.toUpperCase());
        const seen = new Set<string>();
        for (const name of normalized) {
            if (seen.has(name)) {
                throw new ModelError(`Duplicate constituent '${name}' in sublattice`);
            }
            seen.add(name);
        }
        this.siteRatio = siteRatio;
        this.names = Object.freeze(normalized);
    }

    /** Constituent species names, in declaration order */
    get constituents(): readonly string[] {
        return this.names;
    }

    get constituentCount(): number {
        return this.names.length;
    }

    has(species: string): boolean {
        return this.names.includes(species.toUpperCase());
    }

    /** New sublattice with `species` appended */
    withConstituent(species: string): Sublattice {
        return new Sublattice(this.siteRatio, [...this.names, species]);
    }
}
