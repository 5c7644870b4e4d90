// src/utils/random.ts

/**
 * Uniform [0, 1) generator. Injected so simulated feeds are reproducible in tests.
 */
export interface RandomSource {
    next(): number;
}

export const mathRandom: RandomSource = {
    next: () => Math.random(),
};

export function uniform(rng: RandomSource, min: number, max: number): number {
    return min + (max - min) * rng.next();
}

/**
 * Normal variate via the Box-Muller transform.
 */
export function gaussian(
    rng: RandomSource,
    mean: number,
    stdDev: number
): number {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - rng.next();
    const u2 = rng.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + stdDev * z;
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new RangeError("Cannot pick from an empty list");
    }
    const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
    return items[index];
}
