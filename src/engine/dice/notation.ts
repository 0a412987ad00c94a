/**
 * Dice notation valuation
 *
 * Health rolls are opaque tokens to the archetype engine; nothing here rolls
 * dice. These helpers only score a token so two candidates can be compared
 * when archetypes are merged.
 *
 * Supported notation: NdS, NdS+M, NdS-M (e.g. "1d6", "2d8+3", "1d6-1").
 */

export class DiceNotationError extends Error {
    constructor(public notation: string) {
        super(`Invalid dice notation: ${notation}`);
        this.name = 'DiceNotationError';
    }
}

export interface DiceExpression {
    count: number;
    sides: number;
    modifier: number;
}

/** Scores a health roll token; lower scores win a merge. */
export type RollValuator = (notation: string) => number;

export function parseDiceNotation(notation: string): DiceExpression {
    const match = notation.trim().match(/^(\d+)d(\d+)(([+\-])(\d+))?$/i);
    if (!match) {
        throw new DiceNotationError(notation);
    }

    const count = parseInt(match[1], 10);
    const sides = parseInt(match[2], 10);
    const modifier = match[3] ? parseInt(match[4] + match[5], 10) : 0;

    if (count < 1 || sides < 1) {
        throw new DiceNotationError(notation);
    }

    return { count, sides, modifier };
}

/**
 * Mean result of the roll: each die averages (S + 1) / 2.
 * "1d6+1" → 4.5, "1d6" → 3.5, "1d6-1" → 2.5
 */
export const expectedRollValue: RollValuator = (notation) => {
    const { count, sides, modifier } = parseDiceNotation(notation);
    return count * (sides + 1) / 2 + modifier;
};

/** Highest possible result of the roll. */
export const maxRollValue: RollValuator = (notation) => {
    const { count, sides, modifier } = parseDiceNotation(notation);
    return count * sides + modifier;
};
