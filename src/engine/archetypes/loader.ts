import { VALID_ARCHETYPES } from '../../data/archetypes.js';
import { createLogger } from '../../utils/logger.js';
import { suggestMatches } from '../../utils/fuzzy-match.js';
import { RollValuator, expectedRollValue } from '../dice/notation.js';
import { Archetype } from './archetype.js';
import { makeDualArchetype } from './dual.js';
import { ArchetypeError } from './errors.js';
import { createArchetype } from './registry.js';

const log = createLogger('Archetypes');

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Capitalize every hyphen-separated word: "warrior-SCOUT" → "Warrior-Scout"
 */
export function toTitleCase(name: string): string {
    return name.split('-').map(capitalize).join('-');
}

/**
 * Load a single archetype ("warrior") or a dual one ("scout-warrior").
 *
 * Dual names are split at the first hyphen and each side is loaded on its
 * own, so a three-part name reaches the merge as a dual plus a single and is
 * rejected there.
 *
 * @throws ArchetypeError when a name matches no archetype or the merge is illegal
 */
export function loadArchetype(name: string, valuator: RollValuator = expectedRollValue): Archetype {
    const normalized = toTitleCase(name);

    const hyphen = normalized.indexOf('-');
    if (hyphen !== -1) {
        const first = loadArchetype(normalized.slice(0, hyphen), valuator);
        const second = loadArchetype(normalized.slice(hyphen + 1), valuator);
        return makeDualArchetype(first, second, valuator);
    }

    const archetype = createArchetype(normalized);
    if (!archetype) {
        const suggestions = suggestMatches(normalized, VALID_ARCHETYPES);
        log.warn(`Unknown archetype "${name}"`);
        throw new ArchetypeError('Invalid archetype specified.', 'invalid_archetype', suggestions);
    }

    log.debug(`Loaded ${normalized}`);
    return archetype;
}
