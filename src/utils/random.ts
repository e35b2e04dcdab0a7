/**
 * Source of uniform numbers in [0, 1)
 */
export type Rng = () => number;

/**
 * Seeded PRNG (mulberry32); the same seed gives the same sequence.
 */
export function mulberry32(seed: number): Rng {
    let t = seed >>> 0;
    return function () {
        t = (t + 0x6d2b79f5) >>> 0;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

export function pickOne<T>(items: readonly T[], rng: Rng): T {
    if (items.length === 0) {
        throw new RangeError('pickOne called with an empty list');
    }
    const index = Math.floor(rng() * items.length);
    return items[Math.min(index, items.length - 1)];
}
