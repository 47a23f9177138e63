/** Uniform source in `[0, 1)`. */
export type RandomSource = () => number;

/**
 * Seedable mulberry32 generator. Replaying the same seed yields the same
 * sequence on every platform.
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function between(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function pickIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}
