import {
    applyArchetype,
    calculateSecondaryTraits,
    getRemainingAllocation,
    validatePrimaryTraits,
    TraitHost
} from '../src/index.js';

describe('chargen flow', () => {
    it('should take a character from archetype to derived traits', () => {
        const character: TraitHost = { archetype: null, traits: null };
        applyArchetype(character, 'scout');
        applyArchetype(character, 'arcanist');
        expect(character.archetype).toBe('Arcanist-Scout');

        const traits = character.traits;
        if (!traits) throw new Error('traits were not applied');

        // STR 2, PER 5, INT 6, DEX 2, CHA 2, VIT 1, MAG 3
        expect(getRemainingAllocation(traits)).toBe(9);
        traits.VIT.base += 5;
        traits.STR.base += 4;
        expect(validatePrimaryTraits(traits)).toEqual({ valid: true, message: null });

        calculateSecondaryTraits(traits);
        expect(traits.HP.base).toBe(6);
        expect(traits.SP.base).toBe(6);
        expect(traits.SP.mod).toBe(-1);
        expect(traits.ATKM.base).toBe(6);
        expect(traits.BM.max).toBe(10);
        expect(traits.ENC.max).toBe(120);
    });
});
