import seedrandom from 'seedrandom';

/**
 * Uniform source in [0, 1). Every randomized room operation accepts one so
 * tests can pin the outcome with a seed.
 */
export type RandomSource = () => number;

/**
 * Build a random source from seedrandom. Without a seed the generator is
 * auto-seeded and non-reproducible.
 */
export function createRandomSource(seed?: string): RandomSource {
    const rng: seedrandom.PRNG = seedrandom(seed);
    return () => rng();
}

export const defaultRandom: RandomSource = createRandomSource();

/**
 * Integer in [0, bound)
 */
export function randomInt(random: RandomSource, bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
        throw new RangeError(`Random bound must be a positive integer, got ${bound}`);
    }
    return Math.min(Math.floor(random() * bound), bound - 1);
}

export function pickOne<T>(random: RandomSource, values: readonly T[]): T {
    return values[randomInt(random, values.length)];
}

/**
 * Pick up to `count` distinct entries, in draw order
 */
export function sampleWithoutReplacement<T>(random: RandomSource, values: readonly T[], count: number): T[] {
    const pool = [...values];
    const picked: T[] = [];
    while (picked.length < count && pool.length > 0) {
        const [value] = pool.splice(randomInt(random, pool.length), 1);
        picked.push(value);
    }
    return picked;
}
