/** Current time in epoch seconds (fractional). */
export type Clock = () => number;

/** Uniform random number in [0, 1). */
export type RandomSource = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export const systemRandom: RandomSource = () => Math.random();

/** Pick an index in [0, length) from a random source. */
export function pickIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}
