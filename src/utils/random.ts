/**
 * A source of uniform numbers in [0, 1).
 */
export type Random = () => number;

/**
 * Seeded mulberry32 generator. The same seed always yields the same sequence,
 * so a session can be replayed exactly.
 */
export function createRandom(seed: number): Random {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Draw an index from a list of non-negative weights.
 * Returns -1 when every weight is zero.
 */
export function weightedIndex(weights: number[], random: Random): number {
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (total <= 0) return -1;

    let roll = random() * total;
    for (let i = 0; i < weights.length; i++) {
        roll -= weights[i];
        if (roll < 0) return i;
    }
    // Float drift: fall back to the last positive weight
    for (let i = weights.length - 1; i >= 0; i--) {
        if (weights[i] > 0) return i;
    }
    return -1;
}

/**
 * Pick a random element, or undefined for an empty list.
 */
export function pick<T>(items: readonly T[], random: Random): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(random() * items.length)];
}
