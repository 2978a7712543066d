/**
 * Random Source
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every stochastic call site (hit draws, defense rolls, accuracy jitter,
 * launch speed, exploration bonus, FOMO roll, random targeting) draws from
 * an injected RandomSource. Seeded sources replay identically.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
    /** Uniform float in [0, 1) */
    next(): number;
}

/**
 * Create a random source. With a seed the sequence is reproducible;
 * without one it is seeded from system entropy.
 */
export function createRandom(seed?: string | number): RandomSource {
    const prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
    return {
        next: () => prng(),
    };
}

/**
 * Uniform float in [min, max)
 */
export function uniform(rng: RandomSource, min: number, max: number): number {
    return min + rng.next() * (max - min);
}

/**
 * Uniformly pick one item. Returns undefined for an empty list.
 */
export function pick<T>(rng: RandomSource, items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
    return items[index];
}
