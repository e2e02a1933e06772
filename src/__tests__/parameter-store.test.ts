import { describe, it, expect, beforeEach } from 'vitest';
import { Parameter } from '../model/parameter.js';
import { ParameterStore } from '../storage/parameter-store.js';
import { DatabaseFrozenError } from '../utils/errors.js';

const FUNCTION = '298.15 1; 6000 N !';

function build(): Parameter[] {
    return [
        Parameter.fromText('G(LIQUID,FE;0)', FUNCTION),
        Parameter.fromText('G(BCC_A2,FE:VA;0)', FUNCTION),
        Parameter.fromText('TC(BCC_A2,FE:VA;0)', FUNCTION),
        Parameter.fromText('L(LIQUID,CR,FE;0)', FUNCTION),
        Parameter.fromText('G(BCC_A2,CR:VA;0)', FUNCTION),
        Parameter.fromText('L(LIQUID,CR,FE;1)', FUNCTION),
        Parameter.fromText('BMAGN(BCC_A2,FE:VA;0)', FUNCTION),
    ];
}

describe('ParameterStore', () => {
    let store: ParameterStore;
    let parameters: Parameter[];

    beforeEach(() => {
        store = new ParameterStore();
        parameters = build();
        store.insertMany(parameters);
    });

    describe('indices', () => {
        it('should range by phasename in insertion order', () => {
            expect(store.rangeByPhase('BCC_A2')).toEqual([parameters[1], parameters[2], parameters[4], parameters[6]]);
            expect(store.rangeByPhase('liquid')).toEqual([parameters[0], parameters[3], parameters[5]]);
            expect(store.rangeByPhase('BCC')).toEqual([]);
        });

        it('should range by type in insertion order', () => {
            expect(store.rangeByType('G')).toEqual([parameters[0], parameters[1], parameters[4]]);
            expect(store.rangeByType('l')).toEqual([parameters[3], parameters[5]]);
            expect(store.rangeByType('DOES_NOT_EXIST')).toEqual([]);
        });

        it('should list distinct keys in sorted order', () => {
            expect(store.phases()).toEqual(['BCC_A2', 'LIQUID']);
            expect(store.types()).toEqual(['BMAGN', 'G', 'L', 'TC']);
        });

        it('should return the inserted objects', () => {
            expect(store.rangeByType('TC')[0]).toBe(parameters[2]);
            expect([...store]).toEqual(parameters);
            expect(store.size).toBe(7);
        });

        it('should bump the version on every insert', () => {
            expect(store.version).toBe(7);
            store.insert(Parameter.fromText('G(FCC_A1,FE:VA;0)', FUNCTION));
            expect(store.version).toBe(8);
        });
    });

    describe('freeze', () => {
        it('should reject inserts and keep views fresh', () => {
            const view = store.buildView((p) => p.type === 'G');
            store.freeze();
            expect(() => store.insert(Parameter.fromText('G(FCC_A1,FE:VA;0)', FUNCTION))).toThrow(DatabaseFrozenError);
            expect(store.size).toBe(7);
            expect(store.version).toBe(7);
            expect(view.isStale()).toBe(false);
        });
    });

    describe('views', () => {
        it('should hold exactly the parameters a manual filter selects', () => {
            const predicate = (p: Parameter) => p.constituentArray[0]?.includes('CR') ?? false;
            const view = store.buildView(predicate);
            expect([...view]).toEqual(parameters.filter(predicate));
            expect(view.size).toBe(3);
        });

        it('should index the subset both ways', () => {
            const view = store.buildView((p) => p.phasename === 'LIQUID');
            expect(view.rangeByType('L')).toEqual([parameters[3], parameters[5]]);
            expect(view.rangeByPhase('BCC_A2')).toEqual([]);
            expect(view.types()).toEqual(['G', 'L']);
        });

        it('should reference the store objects', () => {
            const view = store.buildView((p) => p.type === 'TC');
            expect(view.rangeByPhase('BCC_A2')[0]).toBe(parameters[2]);
        });

        it('should narrow further with filter', () => {
            const narrowed = store.filter((p) => p.type === 'L').filter((p) => p.degree === 1);
            expect([...narrowed]).toEqual([parameters[5]]);
        });

        it('should report staleness after the store changes', () => {
            const view = store.buildView((p) => p.type === 'G');
            const narrowed = view.filter((p) => p.phasename === 'BCC_A2');
            expect(view.isStale()).toBe(false);
            store.insert(Parameter.fromText('G(FCC_A1,FE:VA;0)', FUNCTION));
            expect(view.isStale()).toBe(true);
            expect(narrowed.isStale()).toBe(true);
            expect(view.size).toBe(3);
        });
    });
});
