/**
 * A source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

// A simple seeded PRNG (mulberry32)
export function mulberry32(a: number): RandomSource {
    return function () {
        a |= 0; a = a + 0x6D2B79F5 | 0;
        let t = Math.imul(a ^ a >>> 15, 1 | a);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Picks a 32-bit seed for callers that did not supply one.
 */
export function randomSeed(): number {
    return Math.floor(Math.random() * 4294967296);
}

/**
 * Shuffles an array in place (Fisher-Yates) and returns it.
 */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
}

/**
 * Picks one element uniformly at random, or undefined when the array is empty.
 */
export function pick<T>(items: readonly T[], random: RandomSource): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(random() * items.length)];
}
