/** Uniform in [0, 1), same contract as `Math.random`. */
export type RandomSource = () => number;

/** Uniform integer in the inclusive range `[min, max]`. */
export const randomInt = (min: number, max: number, random: RandomSource = Math.random) =>
  min + Math.floor(random() * (max - min + 1));

export const pickOne = <T>(items: readonly T[], random: RandomSource = Math.random): T =>
  items[Math.floor(random() * items.length)];
