import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// TRAIT CODES
// ═══════════════════════════════════════════════════════════════════════════

export const PRIMARY_TRAITS = ['STR', 'PER', 'INT', 'DEX', 'CHA', 'VIT', 'MAG'] as const;
export const SECONDARY_TRAITS = ['HP', 'SP', 'BM', 'WM'] as const;
export const SAVE_ROLLS = ['FORT', 'REFL', 'WILL'] as const;
export const COMBAT_TRAITS = ['ATKM', 'ATKR', 'ATKU', 'DEF', 'PP'] as const;
export const OTHER_TRAITS = ['LV', 'XP', 'ENC', 'MV', 'ACT'] as const;

export const ALL_TRAITS = [
    ...PRIMARY_TRAITS,
    ...SECONDARY_TRAITS,
    ...SAVE_ROLLS,
    ...COMBAT_TRAITS,
    ...OTHER_TRAITS
] as const;

export type PrimaryTrait = typeof PRIMARY_TRAITS[number];
export type TraitCode = typeof ALL_TRAITS[number];

// ═══════════════════════════════════════════════════════════════════════════
// TRAIT DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

export const TraitKindSchema = z.enum(['trait', 'gauge', 'counter']);
export type TraitKind = z.infer<typeof TraitKindSchema>;

export const LevelBoundarySchema = z.union([z.number().int().positive(), z.literal('unlimited')]);
export type LevelBoundary = z.infer<typeof LevelBoundarySchema>;

export const TraitExtraSchema = z.object({
    levelBoundaries: z.array(LevelBoundarySchema).optional()
        .describe('XP totals at which each new level is reached'),
    carryFactor: z.number().optional(),
    liftFactor: z.number().optional(),
    pushFactor: z.number().optional()
});
export type TraitExtra = z.infer<typeof TraitExtraSchema>;

export const TraitDefinitionSchema = z.object({
    type: TraitKindSchema,
    base: z.number().finite(),
    mod: z.number().int(),
    min: z.number().optional(),
    max: z.number().optional(),
    name: z.string().min(1).describe('Display name, not authoritative state'),
    extra: TraitExtraSchema.optional()
});
export type TraitDefinition = z.infer<typeof TraitDefinitionSchema>;

/** Which kind of definition every code must carry. */
export const TRAIT_KINDS: Record<TraitCode, TraitKind> = {
    STR: 'trait', PER: 'trait', INT: 'trait', DEX: 'trait', CHA: 'trait', VIT: 'trait', MAG: 'trait',
    HP: 'gauge', SP: 'gauge', BM: 'gauge', WM: 'gauge',
    FORT: 'trait', REFL: 'trait', WILL: 'trait',
    ATKM: 'trait', ATKR: 'trait', ATKU: 'trait', DEF: 'trait', PP: 'counter',
    LV: 'trait', XP: 'trait', ENC: 'counter', MV: 'trait', ACT: 'counter'
};

// ═══════════════════════════════════════════════════════════════════════════
// TRAIT TABLE
// ═══════════════════════════════════════════════════════════════════════════

const traitShape = {
    STR: TraitDefinitionSchema, PER: TraitDefinitionSchema, INT: TraitDefinitionSchema,
    DEX: TraitDefinitionSchema, CHA: TraitDefinitionSchema, VIT: TraitDefinitionSchema,
    MAG: TraitDefinitionSchema,
    HP: TraitDefinitionSchema, SP: TraitDefinitionSchema, BM: TraitDefinitionSchema,
    WM: TraitDefinitionSchema,
    FORT: TraitDefinitionSchema, REFL: TraitDefinitionSchema, WILL: TraitDefinitionSchema,
    ATKM: TraitDefinitionSchema, ATKR: TraitDefinitionSchema, ATKU: TraitDefinitionSchema,
    DEF: TraitDefinitionSchema, PP: TraitDefinitionSchema,
    LV: TraitDefinitionSchema, XP: TraitDefinitionSchema, ENC: TraitDefinitionSchema,
    MV: TraitDefinitionSchema, ACT: TraitDefinitionSchema
} satisfies Record<TraitCode, typeof TraitDefinitionSchema>;

export const TraitTableSchema = z.object(traitShape).strict().superRefine((table, ctx) => {
    for (const code of ALL_TRAITS) {
        const expected = TRAIT_KINDS[code];
        if (table[code].type !== expected) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [code, 'type'],
                message: `${code} must be a ${expected}, got ${table[code].type}`
            });
        }
    }
});

export type TraitTable = z.infer<typeof TraitTableSchema>;

/**
 * Validate a trait table coming from outside the engine (e.g. a host's
 * persisted store). Throws a ZodError listing every problem.
 */
export function parseTraitTable(input: unknown): TraitTable {
    return TraitTableSchema.parse(input);
}

// ═══════════════════════════════════════════════════════════════════════════
// HOST CONTRACT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The only shape this engine needs from a host character object.
 * `archetype` holds the canonical archetype name once one has been applied.
 */
export interface TraitHost {
    archetype: string | null;
    traits: TraitTable | null;
}
