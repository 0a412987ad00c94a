/**
 * Fuzzy name matching
 *
 * Used to attach "did you mean" suggestions to unknown-name errors.
 */

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshtein(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    const matrix: number[][] = [];

    for (let i = 0; i <= a.length; i++) {
        matrix[i] = [i];
    }
    for (let j = 0; j <= b.length; j++) {
        matrix[0][j] = j;
    }

    for (let i = 1; i <= a.length; i++) {
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            matrix[i][j] = Math.min(
                matrix[i - 1][j] + 1,      // deletion
                matrix[i][j - 1] + 1,      // insertion
                matrix[i - 1][j - 1] + cost // substitution
            );
        }
    }

    return matrix[a.length][b.length];
}

/**
 * Similarity score (0-1) between two strings, ignoring case
 */
export function similarity(a: string, b: string): number {
    const distance = levenshtein(a.toLowerCase(), b.toLowerCase());
    const maxLength = Math.max(a.length, b.length);
    if (maxLength === 0) return 1;
    return 1 - distance / maxLength;
}

/**
 * Rank candidates by similarity to the input, best first.
 *
 * @param limit - Maximum number of suggestions returned
 * @param threshold - Candidates scoring below this are dropped
 *
 * @example
 * suggestMatches('warior', ['Arcanist', 'Scout', 'Warrior']); // ['Warrior']
 */
export function suggestMatches(
    input: string,
    candidates: readonly string[],
    limit: number = 3,
    threshold: number = 0.4
): string[] {
    return candidates
        .map(value => ({ value, similarity: similarity(input, value) }))
        .filter(scored => scored.similarity >= threshold)
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, limit)
        .map(scored => scored.value);
}
