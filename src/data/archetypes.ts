/**
 * Archetype starting data
 *
 * Each archetype is the default trait table plus a handful of overrides and
 * the dice token used to roll its health. Dual archetypes are never listed
 * here; they are merged on demand from two of these.
 */

import type { TraitCode } from '../schema/trait.js';

export const VALID_ARCHETYPES = ['Arcanist', 'Scout', 'Warrior'] as const;
export type ArchetypeName = typeof VALID_ARCHETYPES[number];

export type DualArchetypeName = 'Warrior-Scout' | 'Warrior-Arcanist' | 'Arcanist-Scout';

export interface TraitOverride {
    readonly base?: number;
    readonly mod?: number;
}

export interface ArchetypeDefinition {
    readonly name: ArchetypeName;
    readonly overrides: Readonly<Partial<Record<TraitCode, TraitOverride>>>;
    readonly healthRoll: string;
}

// Shared by every load, so frozen all the way down.
function freezeDefinition(definition: ArchetypeDefinition): ArchetypeDefinition {
    for (const override of Object.values(definition.overrides)) {
        Object.freeze(override);
    }
    Object.freeze(definition.overrides);
    return Object.freeze(definition);
}

const definitions: ArchetypeDefinition[] = [
    {
        name: 'Arcanist',
        overrides: {
            PER: { base: 4 },
            INT: { base: 6 },
            CHA: { base: 4 },
            MAG: { base: 6 },
            SP: { mod: -2 },
            MV: { base: 7 }
        },
        healthRoll: '1d6-1'
    },
    {
        name: 'Scout',
        overrides: {
            STR: { base: 4 },
            PER: { base: 6 },
            INT: { base: 6 },
            DEX: { base: 4 }
        },
        healthRoll: '1d6'
    },
    {
        name: 'Warrior',
        overrides: {
            STR: { base: 6 },
            DEX: { base: 4 },
            CHA: { base: 4 },
            VIT: { base: 6 },
            PP: { base: 2 },
            MV: { base: 5 }
        },
        healthRoll: '1d6+1'
    }
];

export const ARCHETYPE_DEFINITIONS: readonly ArchetypeDefinition[] =
    Object.freeze(definitions.map(freezeDefinition));

export interface DualNameEntry {
    readonly pair: readonly [ArchetypeName, ArchetypeName];
    readonly name: DualArchetypeName;
}

// Canonical spelling per unordered pair; order does not follow the arguments.
const dualNames: DualNameEntry[] = [
    { pair: ['Warrior', 'Scout'], name: 'Warrior-Scout' },
    { pair: ['Warrior', 'Arcanist'], name: 'Warrior-Arcanist' },
    { pair: ['Scout', 'Arcanist'], name: 'Arcanist-Scout' }
];

export const DUAL_ARCHETYPE_NAMES: readonly DualNameEntry[] = Object.freeze(
    dualNames.map(entry => Object.freeze({ name: entry.name, pair: Object.freeze(entry.pair) }))
);
