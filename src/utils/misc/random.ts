// src/utils/misc/random.ts

import seedrandom from 'seedrandom';
import type { RandomSource } from '../../@types/index.ts';

/**
 * Returns a reproducible generator for `seed`, or Math.random when no seed is given.
 */
export function createRandomSource(seed?: string): RandomSource {
    if (seed === undefined) {
        return Math.random;
    }
    const prng = seedrandom(`glyphs-${seed}`);
    return () => prng();
}

/**
 * Picks one element uniformly with the given random source.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
    const index = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[index];
}
