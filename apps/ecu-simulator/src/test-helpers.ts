import type { RandomSource } from "./random";

/** Replays `values` in order, wrapping around at the end. */
export const sequenceRandom = (values: readonly number[]): RandomSource => {
  let idx = 0;
  return () => {
    const value = values[idx % values.length];
    idx += 1;
    return value;
  };
};

export const waitFor = async (check: () => boolean, timeoutMs = 1000) => {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
};
