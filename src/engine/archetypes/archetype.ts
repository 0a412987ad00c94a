import { createDefaultTraitTable } from '../../data/trait-definitions.js';
import type { ArchetypeDefinition, ArchetypeName, DualArchetypeName } from '../../data/archetypes.js';
import { ALL_TRAITS, TraitTable } from '../../schema/trait.js';

/**
 * A named trait template. Archetypes are built per request and thrown away
 * once their table has been copied onto a character; only the name is
 * remembered by the host.
 */
export interface Archetype {
    readonly name: ArchetypeName | DualArchetypeName | null;
    /** Fresh per instance; copied again when applied to a character */
    readonly traits: TraitTable;
    /** Dice token for health rolls, handed as-is to the host's roller */
    readonly healthRoll: string | null;
}

/**
 * Seal an archetype's identity. The trait table itself stays writable.
 */
export function createArchetypeInstance(
    name: Archetype['name'],
    traits: TraitTable,
    healthRoll: string | null
): Archetype {
    return Object.freeze({ name, traits, healthRoll });
}

/**
 * An unnamed archetype holding nothing but default values.
 */
export function createBaseArchetype(): Archetype {
    return createArchetypeInstance(null, createDefaultTraitTable(), null);
}

export function buildArchetype(definition: ArchetypeDefinition): Archetype {
    const traits = createDefaultTraitTable();

    for (const code of ALL_TRAITS) {
        const override = definition.overrides[code];
        if (!override) continue;
        const trait = traits[code];
        if (override.base !== undefined) trait.base = override.base;
        if (override.mod !== undefined) trait.mod = override.mod;
    }

    return createArchetypeInstance(definition.name, traits, definition.healthRoll);
}
