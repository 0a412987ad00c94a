import { createDefaultTraitTable } from '../../src/data/trait-definitions.js';
import { ALL_TRAITS, TRAIT_KINDS, parseTraitTable } from '../../src/schema/trait.js';

describe('trait schema', () => {
    it('should list every code once', () => {
        expect(ALL_TRAITS).toHaveLength(24);
        expect(new Set(ALL_TRAITS).size).toBe(ALL_TRAITS.length);
    });

    it('should give each default the kind its code requires', () => {
        const table = createDefaultTraitTable();
        for (const code of ALL_TRAITS) {
            expect(table[code].type).toBe(TRAIT_KINDS[code]);
        }
    });

    it('should accept the default table', () => {
        expect(parseTraitTable(createDefaultTraitTable())).toEqual(createDefaultTraitTable());
    });

    it('should reject a table missing a code', () => {
        const { STR: _strength, ...rest } = createDefaultTraitTable();
        expect(() => parseTraitTable(rest)).toThrow();
    });

    it('should reject unknown codes', () => {
        const table = { ...createDefaultTraitTable(), LUCK: { type: 'trait', base: 1, mod: 0, name: 'Luck' } };
        expect(() => parseTraitTable(table)).toThrow(/LUCK/);
    });

    it('should reject a definition of the wrong kind', () => {
        const table = createDefaultTraitTable();
        table.HP.type = 'trait';
        expect(() => parseTraitTable(table)).toThrow('HP must be a gauge, got trait');
    });

    it('should reject fractional modifiers', () => {
        const table = createDefaultTraitTable();
        table.SP.mod = -1.5;
        expect(() => parseTraitTable(table)).toThrow();
    });
});
