/**
 * Dual archetype merging
 *
 * Blends two single archetypes into one: every trait takes the floored mean
 * of the two bases and of the two modifiers, the cheaper health roll wins,
 * and the name comes from a fixed table so that "Scout-Warrior" and
 * "Warrior-Scout" both end up as "Warrior-Scout".
 */

import { DUAL_ARCHETYPE_NAMES, DualArchetypeName } from '../../data/archetypes.js';
import { createDefaultTraitTable } from '../../data/trait-definitions.js';
import { ALL_TRAITS, TraitTable } from '../../schema/trait.js';
import { createLogger } from '../../utils/logger.js';
import { RollValuator, expectedRollValue } from '../dice/notation.js';
import { Archetype, createArchetypeInstance } from './archetype.js';
import { ArchetypeError } from './errors.js';

const log = createLogger('Archetypes').child('Dual');

/**
 * Anything shaped like an archetype. Tables may lack codes; a missing code
 * contributes the merged table's own default for that side.
 */
export interface MergeSource {
    name: string | null;
    traits: Partial<TraitTable>;
    healthRoll: string | null;
}

export function resolveDualName(a: string, b: string): DualArchetypeName {
    const entry = DUAL_ARCHETYPE_NAMES.find(({ pair }) =>
        (pair[0] === a && pair[1] === b) || (pair[0] === b && pair[1] === a)
    );
    if (!entry) {
        log.warn(`No dual archetype for ${a} and ${b}`);
        throw new ArchetypeError(`No dual archetype defined for ${a} and ${b}`, 'unresolved_dual');
    }
    return entry.name;
}

/**
 * Lower valuation wins; a tie keeps `a`.
 */
export function pickHealthRoll(
    a: string | null,
    b: string | null,
    valuator: RollValuator
): string | null {
    if (a === null) return b;
    if (b === null) return a;
    return valuator(b) < valuator(a) ? b : a;
}

export function makeDualArchetype(
    a: MergeSource,
    b: MergeSource,
    valuator: RollValuator = expectedRollValue
): Archetype {
    const nameA = a.name ?? '';
    const nameB = b.name ?? '';

    if (nameA.includes('-') || nameB.includes('-')) {
        log.warn(`Refusing to merge ${nameA} with ${nameB}`);
        throw new ArchetypeError('Cannot create Triple-Archetype', 'invalid_merge');
    }
    if (nameA === nameB) {
        log.warn(`Refusing to merge ${nameA} with itself`);
        throw new ArchetypeError('Cannot create dual of the same Archetype', 'invalid_merge');
    }

    const traits = createDefaultTraitTable();
    for (const code of ALL_TRAITS) {
        const trait = traits[code];
        const left = a.traits[code] ?? trait;
        const right = b.traits[code] ?? trait;
        trait.base = Math.floor((left.base + right.base) / 2);
        trait.mod = Math.floor((left.mod + right.mod) / 2);
    }

    const name = resolveDualName(nameA, nameB);
    log.debug(`Merged ${nameA} and ${nameB} into ${name}`);

    return createArchetypeInstance(
        name,
        traits,
        pickHealthRoll(a.healthRoll, b.healthRoll, valuator)
    );
}
