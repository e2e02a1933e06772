/**
 * Attributes of an element as read from an ELEMENT declaration.
 */
export interface ElementData {
    name: string;
    atomicNumber: number;
    /** Molar mass of the pure element (g/mol) */
    mass: number;
    /** Name of the stable phase at 298.15 K and 1 bar */
    referenceState: string;
    /** Enthalpy difference between 0 K and 298.15 K (J/mol) */
    H298: number;
    /** Entropy difference between 0 K and 298.15 K (J/mol/K) */
    S298: number;
}

/**
 * A chemical element. Immutable once created.
 */
export class Element {
    readonly name: string;
    readonly atomicNumber: number;
    readonly mass: number;
    readonly referenceState: string;
    readonly H298: number;
    readonly S298: number;

    constructor(data: ElementData) {
        this.name = data.name.toUpperCase();
        this.atomicNumber = data.atomicNumber;
        this.mass = data.mass;
        this.referenceState = data.referenceState.toUpperCase();
        this.H298 = data.H298;
        this.S298 = data.S298;
        Object.freeze(this);
    }

    toJSON(): ElementData {
        return {
            name: this.name,
            atomicNumber: this.atomicNumber,
            mass: this.mass,
            referenceState: this.referenceState,
            H298: this.H298,
            S298: this.S298,
        };
    }
}
