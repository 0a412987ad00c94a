export type ArchetypeErrorKind =
    | 'invalid_archetype'
    | 'already_applied'
    | 'invalid_merge'
    | 'unresolved_dual';

/**
 * Raised for every archetype failure: unknown names, re-applying the same
 * archetype, illegal merges and dual names missing from the lookup.
 */
export class ArchetypeError extends Error {
    constructor(
        message: string,
        public kind: ArchetypeErrorKind,
        public suggestions: string[] = []
    ) {
        super(message);
        this.name = 'ArchetypeError';
    }

    toString(): string {
        let msg = this.message;
        if (this.suggestions.length > 0) {
            msg += ` Did you mean: ${this.suggestions.join(', ')}?`;
        }
        return msg;
    }
}
