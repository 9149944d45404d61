import { isPrimitiveKind, type PrimitiveKind } from '../geometry/types';

/**
 * Scene-local primitive ids of the form `<kind>_<n>`, numbered per kind.
 * Ids never reach the saved record; they only tell primitives in a scene apart.
 */
const sequences = new Map<PrimitiveKind, number>();

const ID_PATTERN = /^([a-z]+)_(\d+)$/;

export const ID = {
    next(kind: PrimitiveKind): string {
        const n = (sequences.get(kind) ?? 0) + 1;
        sequences.set(kind, n);
        return `${kind}_${n}`;
    },

    /** Last number handed out for `kind`, 0 before the first. */
    current(kind: PrimitiveKind): number {
        return sequences.get(kind) ?? 0;
    },

    /**
     * Moves each sequence past the ids already in use, so primitives made
     * afterwards never collide with them. Sequences only move forward.
     */
    reseed(ids: Iterable<string>): void {
        for (const id of ids) {
            const match = ID_PATTERN.exec(id);
            if (!match || !isPrimitiveKind(match[1])) continue;
            const n = Number(match[2]);
            if (n > (sequences.get(match[1]) ?? 0)) sequences.set(match[1], n);
        }
    },

    reset(): void {
        sequences.clear();
    },
};
