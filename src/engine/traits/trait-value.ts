import { PRIMARY_TRAITS, TraitDefinition, TraitTable } from '../../schema/trait.js';

/**
 * Current value of a trait: base plus modifier, held inside whichever of
 * min/max the definition sets.
 */
export function actualValue(trait: TraitDefinition): number {
    let value = trait.base + trait.mod;
    if (trait.min !== undefined) {
        value = Math.max(value, trait.min);
    }
    if (trait.max !== undefined) {
        value = Math.min(value, trait.max);
    }
    return value;
}

export function cloneTraitTable(table: TraitTable): TraitTable {
    return structuredClone(table);
}

export function sumPrimaryBases(table: TraitTable): number {
    return PRIMARY_TRAITS.reduce((sum, code) => sum + table[code].base, 0);
}
