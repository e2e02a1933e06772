import { describe, it, expect, beforeEach } from 'vitest';
import { StateConditions } from '../function/conditions.js';
import { ThermoDatabase } from '../model/database.js';
import { Element } from '../model/element.js';
import { Parameter } from '../model/parameter.js';
import { Phase } from '../model/phase.js';
import { Species } from '../model/species.js';
import { Sublattice } from '../model/sublattice.js';
import { DatabaseFrozenError, ModelError, StateVariableOutOfRangeError } from '../utils/errors.js';
import { buildFeCr } from './fixtures.js';

describe('ThermoDatabase', () => {
    let db: ThermoDatabase;

    beforeEach(() => {
        db = buildFeCr();
    });

    describe('load phase', () => {
        it('should attach parameters to phases and the store', () => {
            expect(db.stats()).toEqual({ elements: 3, species: 3, phases: 2, functions: 2, parameters: 4 });
            expect(db.phase('liquid')?.parameterCount).toBe(3);
            expect(db.parameters.rangeByPhase('BCC_A2').map((p) => p.descriptor)).toEqual(['G(BCC_A2,FE:VA;0)']);
        });

        it('should reject duplicates and undeclared references', () => {
            expect(() => db.addPhase(new Phase('LIQUID', [new Sublattice(1, ['FE'])]))).toThrow('Duplicate phase LIQUID');
            expect(() => db.addSpecies(new Species('NI', { NI: 1 }))).toThrow(
                'Species NI uses undeclared element NI'
            );
            expect(() => db.addPhase(new Phase('FCC', [new Sublattice(1, ['NI'])]))).toThrow(ModelError);
            expect(() => db.addParameter('G(FCC_A1,FE;0)', '298.15 1; 3000 N !')).toThrow(
                'Parameter G(FCC_A1,FE;0) refers to undeclared phase FCC_A1'
            );
        });
    });

    describe('ordering variants', () => {
        it('should keep A2 and B2 parameters on their own phases', () => {
            const variants = new ThermoDatabase();
            for (const name of ['FE', 'VA']) {
                const element = new Element({ name, atomicNumber: 0, mass: 0, referenceState: 'BCC_A2', H298: 0, S298: 0 });
                variants.addElement(element);
                variants.addSpecies(Species.fromElement(element));
            }
            variants.addPhase(new Phase('BCC_A2', [new Sublattice(1, ['FE']), new Sublattice(3, ['VA'])]));
            variants.addPhase(new Phase('BCC_B2', [new Sublattice(0.5, ['FE']), new Sublattice(0.5, ['FE']), new Sublattice(3, ['VA'])]));

            variants.addParameter('G(BCC_A2,FE:VA;0)', '298.15 1; 3000 N !');
            variants.addParameter('G(BCC_B2,FE:FE:VA;0)', '298.15 2; 3000 N !');

            expect(variants.phase('BCC_A2')?.parameterCount).toBe(1);
            expect(variants.phase('BCC_B2')?.parameterCount).toBe(1);
            expect(variants.parameters.rangeByPhase('BCC_B2').map((p) => p.descriptor)).toEqual(['G(BCC_B2,FE:FE:VA;0)']);
        });

        it('should fall back to a phase declared without its suffix', () => {
            expect(db.phase('BCC')?.parameterCount).toBe(1);
        });
    });

    describe('freeze', () => {
        it('should reject every mutation once frozen', () => {
            db.freeze();
            expect(db.isFrozen).toBe(true);
            expect(() => db.defineFunction('X', '298.15 1; 3000 N !')).toThrow(
                'Cannot define function: the database is frozen'
            );
            expect(() => db.addParameter('G(LIQUID,FE;1)', '298.15 1; 3000 N !')).toThrow(DatabaseFrozenError);
            expect(() => db.addPhase(new Phase('FCC', [new Sublattice(1, ['FE'])]))).toThrow(DatabaseFrozenError);
        });

        it('should lock the FUNCTION table, the store and the phases', () => {
            db.freeze();
            expect(() => db.functions.define('GHSERFE', '298.15 999; 3000 N !')).toThrow(
                'Cannot define function: the database is frozen'
            );
            expect(() => db.parameters.insert(Parameter.fromText('G(LIQUID,FE;1)', '298.15 1; 3000 N !'))).toThrow(
                'Cannot insert parameter: the database is frozen'
            );
            expect(() => db.phase('LIQUID')?.addParameter(Parameter.fromText('G(LIQUID,FE;1)', '298.15 1; 3000 N !'))).toThrow(
                DatabaseFrozenError
            );

            const [liquidFe] = db.parameters.rangeByPhase('LIQUID');
            if (!liquidFe) throw new Error('missing LIQUID parameter');
            expect(db.evaluateAt(liquidFe, 500)).toBe(610);
            expect(db.parameters.size).toBe(4);
            expect(db.phase('LIQUID')?.parameterCount).toBe(3);
        });

        it('should resolve every FUNCTION up front', () => {
            db.freeze();
            expect(db.functions.cachedCount).toBe(2);
        });
    });

    describe('evaluation', () => {
        it('should evaluate parameters through the FUNCTION table', () => {
            db.freeze();
            const [liquidFe, liquidCr, interaction] = db.parameters.rangeByPhase('LIQUID');
            if (!liquidFe || !liquidCr || !interaction) throw new Error('missing LIQUID parameters');
            expect(db.evaluateAt(liquidFe, 500)).toBe(610);
            expect(db.evaluateAt(liquidFe, 2000)).toBe(4010);
            expect(db.evaluateAt(liquidCr, 500)).toBe(450);
            expect(db.evaluateParameter(interaction, new StateConditions({ T: 700 }))).toBe(-300);
        });

        it('should apply the range policy', () => {
            const [liquidFe] = db.parameters.rangeByPhase('LIQUID');
            if (!liquidFe) throw new Error('missing LIQUID parameter');
            expect(() => db.evaluateAt(liquidFe, 4000)).toThrow(StateVariableOutOfRangeError);
            expect(db.evaluateAt(liquidFe, 4000, 'extrapolate')).toBe(8010);
        });
    });
});
