import { Element } from '../model/element.js';
import { ThermoDatabase } from '../model/database.js';
import { Phase } from '../model/phase.js';
import { Species } from '../model/species.js';
import { Sublattice } from '../model/sublattice.js';

/** Shared function texts and databases for the test suites. */

export const STEP_FUNCTION = '298.15 1; 1000 Y T;,,N REF: 0 !';

/** Four-segment Gibbs energy expression with a trailing citation */
export const FOUR_SEGMENTS = [
    '298.15  -7285.889+119.139857*T-23.7592624*T*LN(T) \\',
    '  -.002623033*T**2+1.70109E-07*T**3-3293*T**(-1);  1.30000E+03  Y \\',
    '  -22389.955+243.88676*T-41.137088*T*LN(T)+.006167572*T**2 \\',
    '  -6.55136E-07*T**3+2429586*T**(-1);  2.50000E+03  Y \\',
    '  +229382.886-722.59722*T+78.5244752*T*LN(T)-.017983376*T**2 \\',
    '  +1.95033E-07*T**3-93813648*T**(-1);  3.29000E+03  Y \\',
    '  -1042384.01+2985.49125*T-362.159132*T*LN(T)+.043117795*T**2 \\',
    '  -1.055148E-06*T**3+5.54714342E+08*T**(-1);,,N REF: 91Din !',
].join('\n');

export const FOUR_SEGMENT_VALUES: ReadonlyArray<[temperature: number, value: number]> = [
    [300, -12441.687940030079],
    [1400, -86131.31921452633],
    [3000, -240177.048475892],
    [3500, -295643.02286814956],
];

export function relativeError(actual: number, expected: number): number {
    return Math.abs(actual - expected) / Math.abs(expected);
}

/** Small Fe-Cr database: two phases, two FUNCTIONs, four parameters */
export function buildFeCr(): ThermoDatabase {
    const db = new ThermoDatabase();
    for (const [name, atomicNumber, mass] of [
        ['VA', 0, 0],
        ['CR', 24, 51.996],
        ['FE', 26, 55.847],
    ] as const) {
        const element = new Element({ name, atomicNumber, mass, referenceState: 'BCC_A2', H298: 0, S298: 0 });
        db.addElement(element);
        db.addSpecies(Species.fromElement(element));
    }
    db.addPhase(new Phase('LIQUID', [new Sublattice(1, ['CR', 'FE'])]));
    db.addPhase(new Phase('BCC', [new Sublattice(1, ['CR', 'FE']), new Sublattice(3, ['VA'])]));

    db.defineFunction('GHSERFE', '298.15 100+T; 1000 Y 2*T; 3000 N !');
    db.defineFunction('GHSERCR', '298.15 -50+T; 3000 N !');
    db.addParameter('G(LIQUID,FE;0)', '298.15 GHSERFE#+10; 3000 N REF: test !');
    db.addParameter('G(LIQUID,CR;0)', '298.15 GHSERCR#; 3000 N !');
    db.addParameter('L(LIQUID,CR,FE;0)', '298.15 -1000+T; 3000 N !');
    db.addParameter('G(BCC_A2,FE:VA;0)', '298.15 GHSERFE#; 3000 N !');
    return db;
}
