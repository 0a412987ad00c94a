/**
 * Default trait definitions
 *
 * Every archetype starts from this table before its overrides are applied.
 * BM/WM are capped at 0 until the magic check in calculateSecondaryTraits
 * opens them up.
 */

import type { LevelBoundary, TraitTable } from '../schema/trait.js';

export const XP_LEVEL_BOUNDARIES: readonly LevelBoundary[] = [500, 2000, 4500, 'unlimited'];

export const DEFAULT_MOVEMENT_POINTS = 6;

/**
 * Build a brand new default table. Nothing in the result is shared with a
 * previous call, so callers may mutate it freely.
 */
export function createDefaultTraitTable(): TraitTable {
    return {
        // primary
        STR: { type: 'trait', base: 1, mod: 0, name: 'Strength' },
        PER: { type: 'trait', base: 1, mod: 0, name: 'Perception' },
        INT: { type: 'trait', base: 1, mod: 0, name: 'Intelligence' },
        DEX: { type: 'trait', base: 1, mod: 0, name: 'Dexterity' },
        CHA: { type: 'trait', base: 1, mod: 0, name: 'Charisma' },
        VIT: { type: 'trait', base: 1, mod: 0, name: 'Vitality' },
        // magic
        MAG: { type: 'trait', base: 0, mod: 0, name: 'Magic' },
        BM: { type: 'gauge', base: 0, mod: 0, min: 0, max: 0, name: 'Black Mana' },
        WM: { type: 'gauge', base: 0, mod: 0, min: 0, max: 0, name: 'White Mana' },
        // secondary
        HP: { type: 'gauge', base: 0, mod: 0, name: 'Health' },
        SP: { type: 'gauge', base: 0, mod: 0, name: 'Stamina' },
        // saves
        FORT: { type: 'trait', base: 0, mod: 0, name: 'Fortitude Save' },
        REFL: { type: 'trait', base: 0, mod: 0, name: 'Reflex Save' },
        WILL: { type: 'trait', base: 0, mod: 0, name: 'Will Save' },
        // combat
        ATKM: { type: 'trait', base: 0, mod: 0, name: 'Melee Attack' },
        ATKR: { type: 'trait', base: 0, mod: 0, name: 'Ranged Attack' },
        ATKU: { type: 'trait', base: 0, mod: 0, name: 'Unarmed Attack' },
        DEF: { type: 'trait', base: 0, mod: 0, name: 'Defense' },
        ACT: { type: 'counter', base: 0, mod: 0, min: 0, name: 'Action Points' },
        PP: { type: 'counter', base: 0, mod: 0, min: 0, name: 'Power Points' },
        // misc
        ENC: { type: 'counter', base: 0, mod: 0, min: 0, name: 'Carry Weight' },
        MV: { type: 'trait', base: DEFAULT_MOVEMENT_POINTS, mod: 0, name: 'Movement Points' },
        LV: { type: 'trait', base: 0, mod: 0, name: 'Level' },
        XP: {
            type: 'trait', base: 0, mod: 0, name: 'Experience',
            extra: { levelBoundaries: [...XP_LEVEL_BOUNDARIES] }
        }
    };
}
