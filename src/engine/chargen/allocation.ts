/**
 * Character creation: archetype assignment and primary point accounting
 *
 * - applyArchetype: make a character a single or dual archetype
 * - getRemainingAllocation: points still to spend on primary traits
 * - validatePrimaryTraits: does the allocation hit the exact total?
 * - checkPrimaryTraitBounds: which primaries sit outside their range?
 */

import { getConfig } from '../../config.js';
import { VALID_ARCHETYPES } from '../../data/archetypes.js';
import { PRIMARY_TRAITS, PrimaryTrait, TraitHost, TraitTable } from '../../schema/trait.js';
import { suggestMatches } from '../../utils/fuzzy-match.js';
import { createLogger } from '../../utils/logger.js';
import { RollValuator, expectedRollValue } from '../dice/notation.js';
import { ArchetypeError } from '../archetypes/errors.js';
import { loadArchetype } from '../archetypes/loader.js';
import { isArchetypeName } from '../archetypes/registry.js';
import { cloneTraitTable, sumPrimaryBases } from '../traits/trait-value.js';

const log = createLogger('Chargen');

export const PRIMARY_TRAIT_MIN = 1;
export const PRIMARY_TRAIT_MAX = 10;
export const MAGIC_TRAIT_MIN = 0;

export interface AllocationResult {
    valid: boolean;
    message: string | null;
}

export interface ApplyArchetypeOptions {
    /** Drop any current archetype instead of forming a dual */
    reset?: boolean;
    valuator?: RollValuator;
}

/**
 * Make `character` the named archetype and reset its traits to that
 * archetype's defaults. Applying a second, different archetype turns the
 * character into the matching dual archetype.
 *
 * Destructive: the character's trait store is replaced wholesale.
 *
 * @throws ArchetypeError for unknown names or re-applying the current archetype
 */
export function applyArchetype(
    character: TraitHost,
    name: string,
    options: ApplyArchetypeOptions = {}
): void {
    const { reset = false, valuator = expectedRollValue } = options;

    const requested = name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
    if (!isArchetypeName(requested)) {
        log.warn(`Unknown archetype "${name}"`);
        throw new ArchetypeError(
            'Invalid archetype.',
            'invalid_archetype',
            suggestMatches(requested, VALID_ARCHETYPES)
        );
    }

    let toLoad: string = requested;
    if (character.archetype !== null && !reset) {
        if (character.archetype === requested) {
            log.warn(`Character is already a ${requested}`);
            throw new ArchetypeError(`Character is already a ${requested}`, 'already_applied');
        }
        toLoad = `${character.archetype}-${requested}`;
    }

    const archetype = loadArchetype(toLoad, valuator);
    character.traits = cloneTraitTable(archetype.traits);
    character.archetype = archetype.name;

    log.debug(`Applied ${archetype.name ?? toLoad}${reset ? ' (reset)' : ''}`);
}

/**
 * Points left to allocate to primary traits. Negative when over-allocated.
 */
export function getRemainingAllocation(
    traits: TraitTable,
    total: number = getConfig().primaryPoints
): number {
    return total - sumPrimaryBases(traits);
}

/**
 * Check that primary trait bases add up to exactly the configured total.
 *
 * Only the total is checked here. Per-trait ranges are reported separately
 * by checkPrimaryTraitBounds, which the allocation UI runs as points move.
 */
export function validatePrimaryTraits(
    traits: TraitTable,
    total: number = getConfig().primaryPoints
): AllocationResult {
    const allocated = sumPrimaryBases(traits);
    if (allocated > total) {
        return { valid: false, message: 'Too many trait points allocated.' };
    }
    if (allocated < total) {
        return { valid: false, message: 'Not enough trait points allocated.' };
    }
    return { valid: true, message: null };
}

/**
 * Primary traits whose base lies outside [1, 10]; MAG may also be 0.
 */
export function checkPrimaryTraitBounds(traits: TraitTable): PrimaryTrait[] {
    return PRIMARY_TRAITS.filter(code => {
        const min = code === 'MAG' ? MAGIC_TRAIT_MIN : PRIMARY_TRAIT_MIN;
        const base = traits[code].base;
        return base < min || base > PRIMARY_TRAIT_MAX;
    });
}
