import { createDefaultTraitTable } from '../../../src/data/trait-definitions.js';
import { actualValue, cloneTraitTable, sumPrimaryBases } from '../../../src/engine/traits/trait-value.js';

describe('trait values', () => {
    describe('actualValue', () => {
        it('should add base and modifier', () => {
            expect(actualValue({ type: 'trait', base: 5, mod: -2, name: 'Strength' })).toBe(3);
        });

        it('should clamp into min and max', () => {
            expect(actualValue({ type: 'gauge', base: 5, mod: 3, min: 0, max: 6, name: 'Black Mana' })).toBe(6);
            expect(actualValue({ type: 'gauge', base: 0, mod: -1, min: 0, max: 6, name: 'Black Mana' })).toBe(0);
        });

        it('should only floor counters that set no max', () => {
            expect(actualValue({ type: 'counter', base: 0, mod: -2, min: 0, name: 'Carry Weight' })).toBe(0);
            expect(actualValue({ type: 'counter', base: 250.5, mod: 0, min: 0, name: 'Carry Weight' })).toBe(250.5);
        });

        it('should leave unbounded gauges alone', () => {
            expect(actualValue({ type: 'gauge', base: 3, mod: -5, name: 'Health' })).toBe(-2);
        });
    });

    describe('cloneTraitTable', () => {
        it('should copy nested metadata', () => {
            const table = createDefaultTraitTable();
            const copy = cloneTraitTable(table);

            expect(copy).toEqual(table);
            expect(copy.XP.extra?.levelBoundaries).not.toBe(table.XP.extra?.levelBoundaries);

            copy.STR.base = 8;
            expect(table.STR.base).toBe(1);
        });
    });

    describe('sumPrimaryBases', () => {
        it('should ignore modifiers and non-primary traits', () => {
            const table = createDefaultTraitTable();
            table.STR.mod = 4;
            table.HP.base = 20;
            expect(sumPrimaryBases(table)).toBe(6);
        });
    });
});
