/**
 * Some response fields serialize as a scalar when exactly one value is present.
 * Normalize to a list right after parsing so nothing downstream has to check.
 */
export const oneOrMany = <T>(value: T | T[] | null | undefined): T[] => {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
};

/** Fixed-size chunks; the last one may be shorter. */
export const chunk = <T>(items: readonly T[], size: number): T[][] => {
    if (size < 1) throw new RangeError(`Group size must be positive, got ${size}`);
    const groups: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        groups.push(items.slice(i, i + size));
    }
    return groups;
};
