/**
 * Drill Engine - Random helpers
 *
 * Every random choice in the engine goes through an injected RandomSource so a
 * seeded generator (seedrandom) can make selection reproducible.
 */

import seedrandom from 'seedrandom';
import { RandomSource } from './types';

export const defaultRandom: RandomSource = () => Math.random();

export function createSeededRandom(seed: string): RandomSource {
    const rng = seedrandom(seed);
    return () => rng();
}

export function randomInt(random: RandomSource, maxExclusive: number): number {
    return Math.min(maxExclusive - 1, Math.floor(random() * maxExclusive));
}

/**
 * Uniform choice; undefined for an empty list
 */
export function pickRandom<T>(random: RandomSource, items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[randomInt(random, items.length)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = randomInt(random, i + 1);
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}

/**
 * Pick `count` distinct items without replacement
 */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
    return shuffle(random, items).slice(0, Math.max(0, count));
}
