/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number;

export const uniform = (random: RandomSource, min: number, max: number): number =>
    min + random() * (max - min);

/** Integer in [min, maxExclusive). */
export const randomInt = (random: RandomSource, min: number, maxExclusive: number): number =>
    Math.floor(uniform(random, min, maxExclusive));

export const pick = <T>(random: RandomSource, items: readonly T[]): T | undefined =>
    items[Math.floor(random() * items.length)];
