import type { LevelBoundary, TraitTable } from '../../schema/trait.js';
import { actualValue } from '../traits/trait-value.js';

export const CARRY_FACTOR = 10;
export const LIFT_FACTOR = 20;
export const PUSH_FACTOR = 40;

export const MANA_CAP = 10;

/**
 * Derive secondary traits, saves and combat values from the primaries.
 *
 * Run once primary traits are final. Overwrites every derived value, so
 * calling it again on unchanged primaries changes nothing. Input is assumed
 * to be validated already.
 */
export function calculateSecondaryTraits(traits: TraitTable): TraitTable {
    const vit = actualValue(traits.VIT);
    const dex = actualValue(traits.DEX);
    const str = actualValue(traits.STR);

    // secondary
    traits.HP.base = vit;
    traits.SP.base = vit;
    // saves
    traits.FORT.base = vit;
    traits.REFL.base = dex;
    traits.WILL.base = actualValue(traits.INT);
    // combat
    traits.ATKM.base = str;
    traits.ATKR.base = actualValue(traits.PER);
    traits.ATKU.base = dex;
    traits.DEF.base = dex;
    // mana stays locked without magic
    const manaCap = traits.MAG.base > 0 ? MANA_CAP : 0;
    traits.BM.max = manaCap;
    traits.WM.max = manaCap;
    // encumbrance
    traits.STR.extra = {
        ...traits.STR.extra,
        carryFactor: CARRY_FACTOR,
        liftFactor: LIFT_FACTOR,
        pushFactor: PUSH_FACTOR
    };
    traits.ENC.max = LIFT_FACTOR * str;

    return traits;
}

/**
 * How many XP level boundaries the character has crossed. The final
 * 'unlimited' boundary is never reached.
 */
export function levelForExperience(traits: TraitTable): number {
    const boundaries: readonly LevelBoundary[] = traits.XP.extra?.levelBoundaries ?? [];
    const xp = actualValue(traits.XP);
    let level = 0;
    for (const boundary of boundaries) {
        if (boundary === 'unlimited' || xp < boundary) break;
        level++;
    }
    return level;
}
