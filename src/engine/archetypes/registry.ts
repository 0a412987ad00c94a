/**
 * Archetype registry
 *
 * Explicit name → definition lookup for single archetypes. The registry is
 * checked against VALID_ARCHETYPES when this module loads, so a name added
 * to one list but not the other fails at startup instead of at chargen.
 */

import {
    ARCHETYPE_DEFINITIONS,
    ArchetypeDefinition,
    ArchetypeName,
    VALID_ARCHETYPES
} from '../../data/archetypes.js';
import { Archetype, buildArchetype } from './archetype.js';

export function buildRegistry(
    definitions: readonly ArchetypeDefinition[]
): ReadonlyMap<string, ArchetypeDefinition> {
    const registry = new Map<string, ArchetypeDefinition>();
    for (const definition of definitions) {
        if (registry.has(definition.name)) {
            throw new Error(`Archetype registered twice: ${definition.name}`);
        }
        registry.set(definition.name, definition);
    }
    return registry;
}

/**
 * Throws unless every valid name has a definition and every definition has a
 * valid name.
 */
export function assertRegistryComplete(
    registry: ReadonlyMap<string, ArchetypeDefinition>,
    validNames: readonly string[]
): void {
    const missing = validNames.filter(name => !registry.has(name));
    const unexpected = [...registry.keys()].filter(name => !validNames.includes(name));

    if (missing.length > 0 || unexpected.length > 0) {
        const problems: string[] = [];
        if (missing.length > 0) problems.push(`missing: ${missing.join(', ')}`);
        if (unexpected.length > 0) problems.push(`not valid: ${unexpected.join(', ')}`);
        throw new Error(`Archetype registry out of sync (${problems.join('; ')})`);
    }
}

const REGISTRY = buildRegistry(ARCHETYPE_DEFINITIONS);
assertRegistryComplete(REGISTRY, VALID_ARCHETYPES);

export function isArchetypeName(name: string): name is ArchetypeName {
    return REGISTRY.has(name);
}

/**
 * Fresh instance of a single archetype, or null for an unregistered name.
 */
export function createArchetype(name: string): Archetype | null {
    const definition = REGISTRY.get(name);
    return definition ? buildArchetype(definition) : null;
}
