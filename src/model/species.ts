import { ModelError } from '../utils/errors.js';
import type { Element } from './element.js';

/** Element name -> stoichiometric count */
export type ChemicalFormula = ReadonlyMap<string, number>;

function isFormulaMap(formula: ChemicalFormula | Record<string, number>): formula is ChemicalFormula {
    return formula instanceof Map;
}

/**
 * A chemical species: a named formula.
 *
 * Two species are equal when their names match. The formula is not compared,
 * so two differently defined species sharing a name are indistinguishable.
 */
export class Species {
    readonly name: string;
    readonly formula: ChemicalFormula;

    constructor(name: string, formula: ChemicalFormula | Record<string, number>) {
        this.name = name.toUpperCase();

        const entries = isFormulaMap(formula) ? [...formula.entries()] : Object.entries(formula);
        const normalized = new Map<string, number>();
        for (const [element, count] of entries) {
            if (!Number.isFinite(count) || count < 0) {
                throw new ModelError(`Species ${this.name}: invalid count ${count} for element ${element}`);
            }
            const key = element.toUpperCase();
            normalized.set(key, (normalized.get(key) ?? 0) + count);
        }
        this.formula = normalized;
    }

    /** Pure-element species, formula `{ element: 1 }` */
    static fromElement(element: Element): Species {
        return new Species(element.name, new Map([[element.name, 1]]));
    }

    equals(other: Species): boolean {
        return this.name === other.name;
    }

    /** Stoichiometric count of `element`, 0 when absent */
    count(element: string): number {
        return this.formula.get(element.toUpperCase()) ?? 0;
    }

    /** Elements with a non-zero count, in formula order */
    elements(): string[] {
        return [...this.formula].filter(([, count]) => count > 0).map(([element]) => element);
    }

    toJSON(): { name: string; formula: Record<string, number> } {
        return { name: this.name, formula: Object.fromEntries(this.formula) };
    }
}
