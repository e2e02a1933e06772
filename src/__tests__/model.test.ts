import { describe, it, expect } from 'vitest';
import { Element } from '../model/element.js';
import { Parameter } from '../model/parameter.js';
import { Phase } from '../model/phase.js';
import { Species } from '../model/species.js';
import { Sublattice } from '../model/sublattice.js';
import { parseFunction } from '../function/parser.js';
import { DatabaseFrozenError, ModelError } from '../utils/errors.js';

const CONSTANT = parseFunction('298.15 1000; 6000 N !');

describe('Element', () => {
    it('should normalize names and serialize', () => {
        const fe = new Element({ name: 'fe', atomicNumber: 26, mass: 55.847, referenceState: 'bcc_a2', H298: 4489, S298: 27.28 });
        expect(fe.toJSON()).toEqual({
            name: 'FE',
            atomicNumber: 26,
            mass: 55.847,
            referenceState: 'BCC_A2',
            H298: 4489,
            S298: 27.28,
        });
        expect(Object.isFrozen(fe)).toBe(true);
    });
});

describe('Species', () => {
    it('should compare by name only', () => {
        const a = new Species('AL2O3', { AL: 2, O: 3 });
        const b = new Species('al2o3', new Map([['AL', 1]]));
        expect(a.equals(b)).toBe(true);
        expect(a.equals(new Species('O2', { O: 2 }))).toBe(false);
    });

    it('should merge element keys case-insensitively', () => {
        const species = new Species('X', { Fe: 1, FE: 2 });
        expect(species.count('fe')).toBe(3);
        expect(species.count('CR')).toBe(0);
    });

    it('should list only elements with a non-zero count', () => {
        expect(new Species('X', { FE: 1, CR: 0, VA: 2 }).elements()).toEqual(['FE', 'VA']);
    });

    it('should reject negative counts', () => {
        expect(() => new Species('X', { FE: -1 })).toThrow(ModelError);
    });

    it('should build a pure-element species', () => {
        const el = new Element({ name: 'CR', atomicNumber: 24, mass: 51.996, referenceState: 'BCC_A2', H298: 4050, S298: 23.56 });
        expect(Species.fromElement(el).toJSON()).toEqual({ name: 'CR', formula: { CR: 1 } });
    });
});

describe('Sublattice', () => {
    it('should reject duplicate constituents', () => {
        expect(() => new Sublattice(1, ['FE', 'fe'])).toThrow("Duplicate constituent 'FE' in sublattice");
    });

    it('should reject an invalid site ratio', () => {
        expect(() => new Sublattice(-1, ['FE'])).toThrow(ModelError);
    });

    it('should add constituents without mutating', () => {
        const original = new Sublattice(3, ['VA']);
        const extended = original.withConstituent('c');
        expect(original.constituents).toEqual(['VA']);
        expect(extended.constituents).toEqual(['VA', 'C']);
        expect(extended.siteRatio).toBe(3);
        expect(extended.has('c')).toBe(true);
    });
});

describe('Parameter', () => {
    it('should derive phasename from phase and suffix', () => {
        const withSuffix = new Parameter({ phase: 'bcc', suffix: 'a2', type: 'g', constituentArray: [['FE'], ['VA']], function: CONSTANT });
        const plain = new Parameter({ phase: 'LIQUID', type: 'G', constituentArray: [['FE']], function: CONSTANT });
        expect(withSuffix.phasename).toBe('BCC_A2');
        expect(plain.phasename).toBe('LIQUID');
        expect(withSuffix.descriptor).toBe('G(BCC_A2,FE:VA;0)');
    });

    it('should build from descriptor and function text', () => {
        const parameter = Parameter.fromText('L(LIQUID,AL,FE;1)', '298.15 -1000+2*T; 6000 N REF: test !');
        expect(parameter.type).toBe('L');
        expect(parameter.degree).toBe(1);
        expect(parameter.constituentArray).toEqual([['AL', 'FE']]);
        expect(parameter.citation).toBe('test');
        expect(parameter.source).toBe('298.15 -1000+2*T; 6000 N REF: test !');
        expect(parameter.segments).toHaveLength(1);
    });

    it('should reject invalid degrees and empty arrays', () => {
        expect(() => new Parameter({ phase: 'A', type: 'L', constituentArray: [['FE']], degree: -1, function: CONSTANT })).toThrow(
            'Invalid Redlich-Kister degree -1'
        );
        expect(() => new Parameter({ phase: 'A', type: 'L', constituentArray: [['FE']], degree: 1.5, function: CONSTANT })).toThrow(
            ModelError
        );
        expect(() => new Parameter({ phase: 'A', type: 'G', constituentArray: [], function: CONSTANT })).toThrow(ModelError);
    });

    it('should match sublattice occupations', () => {
        const parameter = Parameter.fromText('L(BCC_A2,CR,FE:*;0)', '298.15 1; 6000 N !');
        expect(parameter.appliesTo([['FE', 'CR', 'NI'], ['VA']])).toBe(true);
        expect(parameter.appliesTo([['FE'], ['VA']])).toBe(false);
        expect(parameter.appliesTo([['FE', 'CR']])).toBe(false);
    });
});

describe('Phase', () => {
    const bcc = () => new Phase('bcc', [new Sublattice(1, ['CR', 'FE']), new Sublattice(3, ['VA'])]);

    it('should require a sublattice', () => {
        expect(() => new Phase('EMPTY', [])).toThrow('Phase EMPTY needs at least one sublattice');
    });

    it('should expose sublattices by index', () => {
        const phase = bcc();
        expect(phase.name).toBe('BCC');
        expect(phase.sublatticeCount).toBe(2);
        expect(phase.sublattice(1)?.siteRatio).toBe(3);
        expect(phase.sublattice(2)).toBeUndefined();
        expect(phase.totalSites).toBe(4);
    });

    it('should attach matching parameters', () => {
        const phase = bcc();
        const parameter = Parameter.fromText('G(BCC_A2,FE:VA;0)', '298.15 1; 6000 N !');
        phase.addParameter(parameter);
        expect(phase.parameterCount).toBe(1);
        expect([...phase.parameters()]).toEqual([parameter]);
    });

    it('should match a phase declared under its full name', () => {
        const a2 = new Phase('BCC_A2', [new Sublattice(1, ['FE']), new Sublattice(3, ['VA'])]);
        const a2Parameter = Parameter.fromText('G(BCC_A2,FE:VA;0)', '298.15 1; 6000 N !');
        const b2Parameter = Parameter.fromText('G(BCC_B2,FE:FE:VA;0)', '298.15 1; 6000 N !');
        expect(a2.accepts(a2Parameter)).toBe(true);
        expect(a2.accepts(b2Parameter)).toBe(false);
        a2.addParameter(a2Parameter);
        expect(() => a2.addParameter(b2Parameter)).toThrow('Parameter G(BCC_B2,FE:FE:VA;0) belongs to phase BCC_B2, not BCC_A2');
    });

    it('should reject parameters once frozen', () => {
        const phase = bcc();
        phase.freeze();
        expect(phase.isFrozen).toBe(true);
        expect(() => phase.addParameter(Parameter.fromText('G(BCC_A2,FE:VA;0)', '298.15 1; 6000 N !'))).toThrow(
            DatabaseFrozenError
        );
        expect(phase.parameterCount).toBe(0);
    });

    it('should reject parameters that do not fit the phase', () => {
        const phase = bcc();
        expect(() => phase.addParameter(Parameter.fromText('G(FCC_A1,FE:VA;0)', '298.15 1; 6000 N !'))).toThrow(
            'Parameter G(FCC_A1,FE:VA;0) belongs to phase FCC_A1, not BCC'
        );
        expect(() => phase.addParameter(Parameter.fromText('G(BCC,FE;0)', '298.15 1; 6000 N !'))).toThrow(
            'Parameter G(BCC,FE;0) has 1 sublattices, phase BCC has 2'
        );
        expect(() => phase.addParameter(Parameter.fromText('G(BCC,NI:VA;0)', '298.15 1; 6000 N !'))).toThrow(
            "Parameter G(BCC,NI:VA;0): 'NI' is not a constituent of sublattice 0 of BCC"
        );
    });
});
