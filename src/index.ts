export * from './schema/trait.js';
export * from './data/trait-definitions.js';
export * from './data/archetypes.js';
export * from './engine/traits/trait-value.js';
export * from './engine/dice/notation.js';
export * from './engine/archetypes/archetype.js';
export * from './engine/archetypes/errors.js';
export { createArchetype, isArchetypeName } from './engine/archetypes/registry.js';
export * from './engine/archetypes/dual.js';
export * from './engine/archetypes/loader.js';
export * from './engine/chargen/allocation.js';
export * from './engine/chargen/derivation.js';
export { ConfigError, getConfig, loadConfig, resetConfig } from './config.js';
export type { EngineConfig } from './config.js';
export { createLogger, setLogLevel, resetLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
